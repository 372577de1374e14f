/**
 * Array Session
 * Authenticated REST session against the storage array's management endpoint
 */

import { Agent, Dispatcher, fetch } from 'undici';
import { z } from 'zod';
import { ArrayConfig } from '../config/types';
import { ArrayCredentials, StorageVolume } from '../types';
import {
  CancelledError,
  ConnectionError,
  Outcome,
  RefreshError,
  ReplicationError,
  describeCause,
  fail,
  ok,
} from '../lib/errors';
import { logger } from '../lib/logger';
import { resolveVolumeBySerial } from './volume-resolver';

export interface ArraySession {
  readonly endpoint: string;
  listVolumes(signal?: AbortSignal): Promise<Outcome<StorageVolume[]>>;
  resolveVolumeBySerial(serial: string, signal?: AbortSignal): Promise<Outcome<StorageVolume>>;
  overwriteVolume(targetVolumeName: string, sourceVolumeName: string): Promise<Outcome<void>>;
  disconnect(): Promise<void>;
}

export interface ArrayClient {
  connect(endpoint: string, credentials: ArrayCredentials, signal?: AbortSignal): Promise<Outcome<ArraySession>>;
}

const apiTokenSchema = z.object({ api_token: z.string().min(1) });

const volumeListSchema = z.array(
  z.object({
    name: z.string(),
    serial: z.string(),
  })
);

// The array answers errors as [{ msg, ctx }]
const arrayErrorSchema = z.array(z.object({ msg: z.string(), ctx: z.string().optional() })).nonempty();

interface HttpResponse {
  status: number;
  body: unknown;
  cookies: string[];
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';

interface SendOptions {
  body?: unknown;
  cookie?: string;
  // false leaves the request unbounded by the per-request timeout
  timeout?: boolean;
  signal?: AbortSignal;
}

function describeArrayError(status: number, body: unknown): string {
  const parsed = arrayErrorSchema.safeParse(body);
  if (parsed.success) {
    return parsed.data.map((entry) => (entry.ctx ? `${entry.ctx}: ${entry.msg}` : entry.msg)).join('; ');
  }
  return `HTTP ${status}`;
}

class RestChannel {
  private readonly baseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly requestTimeoutMs: number;

  constructor(baseUrl: string, dispatcher: Dispatcher, requestTimeoutMs: number) {
    this.baseUrl = baseUrl;
    this.dispatcher = dispatcher;
    this.requestTimeoutMs = requestTimeoutMs;
  }

  async send(method: HttpMethod, resource: string, options: SendOptions = {}): Promise<HttpResponse> {
    const headers: Record<string, string> = { accept: 'application/json' };
    if (options.body !== undefined) headers['content-type'] = 'application/json';
    if (options.cookie) headers.cookie = options.cookie;

    // One signal for both the request timeout and the caller's cancellation
    const controller = new AbortController();
    const caller = options.signal;
    const onCallerAbort = (): void => controller.abort(new Error('request cancelled'));
    if (caller?.aborted) {
      onCallerAbort();
    } else {
      caller?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const bounded = options.timeout !== false && this.requestTimeoutMs > 0;
    const timer = bounded
      ? setTimeout(
          () => controller.abort(new Error(`no answer within ${this.requestTimeoutMs}ms`)),
          this.requestTimeoutMs
        )
      : undefined;

    let text: string;
    let status: number;
    let cookies: string[];
    try {
      const response = await fetch(`${this.baseUrl}/${resource}`, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });
      status = response.status;
      cookies = response.headers.getSetCookie().map((cookie) => cookie.split(';')[0].trim());
      text = await response.text();
    } finally {
      clearTimeout(timer);
      caller?.removeEventListener('abort', onCallerAbort);
    }

    let body: unknown = undefined;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }

    return { status, body, cookies };
  }
}

export class FlashArraySession implements ArraySession {
  readonly endpoint: string;
  private readonly channel: RestChannel;
  private readonly cookie: string;
  private connected = true;

  constructor(endpoint: string, channel: RestChannel, cookie: string) {
    this.endpoint = endpoint;
    this.channel = channel;
    this.cookie = cookie;
  }

  private ensureConnected(): RefreshError | null {
    return this.connected ? null : new ConnectionError(`Session to array ${this.endpoint} is closed`);
  }

  async listVolumes(signal?: AbortSignal): Promise<Outcome<StorageVolume[]>> {
    const closed = this.ensureConnected();
    if (closed) return fail(closed);

    let response: HttpResponse;
    try {
      response = await this.channel.send('GET', 'volume', { cookie: this.cookie, signal });
    } catch (error) {
      if (signal?.aborted) {
        return fail(new CancelledError(`Listing volumes on ${this.endpoint} was cancelled`, error));
      }
      return fail(new ConnectionError(`Listing volumes on ${this.endpoint} failed: ${describeCause(error)}`, error));
    }

    if (response.status !== 200) {
      return fail(
        new ConnectionError(`Listing volumes on ${this.endpoint} failed: ${describeArrayError(response.status, response.body)}`)
      );
    }

    const volumes = volumeListSchema.safeParse(response.body);
    if (!volumes.success) {
      return fail(new ConnectionError(`Array ${this.endpoint} returned an unexpected volume listing`, volumes.error));
    }

    return ok(volumes.data.map((volume) => ({ name: volume.name, serial: volume.serial })));
  }

  resolveVolumeBySerial(serial: string, signal?: AbortSignal): Promise<Outcome<StorageVolume>> {
    return resolveVolumeBySerial(this, serial, signal);
  }

  /**
   * Replaces the target volume's contents with a copy of the source volume.
   * The array applies the copy atomically and answers once it is done.
   */
  async overwriteVolume(targetVolumeName: string, sourceVolumeName: string): Promise<Outcome<void>> {
    const closed = this.ensureConnected();
    if (closed) return fail(closed);

    let response: HttpResponse;
    try {
      response = await this.channel.send('POST', `volume/${encodeURIComponent(targetVolumeName)}`, {
        cookie: this.cookie,
        body: { source: sourceVolumeName, overwrite: true },
        timeout: false,
      });
    } catch (error) {
      return fail(
        new ReplicationError(
          `Overwrite of ${targetVolumeName} from ${sourceVolumeName} failed: ${describeCause(error)}`,
          error
        )
      );
    }

    if (response.status !== 200) {
      return fail(
        new ReplicationError(
          `Array rejected overwrite of ${targetVolumeName} from ${sourceVolumeName}: ${describeArrayError(response.status, response.body)}`
        )
      );
    }

    return ok(undefined);
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;

    try {
      const response = await this.channel.send('DELETE', 'auth/session', { cookie: this.cookie });
      if (response.status !== 200) {
        logger.warn(`Array ${this.endpoint} did not end the session`, { status: response.status });
      }
    } catch (error) {
      logger.warn(`Could not end session on array ${this.endpoint}`, { error: describeCause(error) });
    }
  }
}

export interface FlashArrayClientOptions {
  // Overrides the TLS agent; tests hand in an undici MockAgent
  dispatcher?: Dispatcher;
}

export class FlashArrayClient implements ArrayClient {
  private readonly config: ArrayConfig;
  private readonly dispatcher: Dispatcher;

  constructor(config: ArrayConfig, options: FlashArrayClientOptions = {}) {
    this.config = config;

    if (config.allowUntrustedCertificate) {
      logger.warn('Accepting untrusted TLS certificates from the array management endpoint');
    }

    this.dispatcher =
      options.dispatcher ??
      new Agent({ connect: { rejectUnauthorized: !config.allowUntrustedCertificate } });
  }

  async connect(
    endpoint: string,
    credentials: ArrayCredentials,
    signal?: AbortSignal
  ): Promise<Outcome<ArraySession>> {
    const channel = new RestChannel(
      `https://${endpoint}/api/${this.config.apiVersion}`,
      this.dispatcher,
      this.config.requestTimeoutMs
    );

    try {
      const tokenResponse = await channel.send('POST', 'auth/apitoken', {
        body: { username: credentials.username, password: credentials.password },
        signal,
      });
      if (tokenResponse.status !== 200) {
        return fail(
          new ConnectionError(
            `Array ${endpoint} refused credentials for ${credentials.username}: ${describeArrayError(tokenResponse.status, tokenResponse.body)}`
          )
        );
      }

      const token = apiTokenSchema.safeParse(tokenResponse.body);
      if (!token.success) {
        return fail(new ConnectionError(`Array ${endpoint} returned no API token`, token.error));
      }

      const sessionResponse = await channel.send('POST', 'auth/session', {
        body: { api_token: token.data.api_token },
        signal,
      });
      if (sessionResponse.status !== 200 || sessionResponse.cookies.length === 0) {
        return fail(
          new ConnectionError(
            `Array ${endpoint} did not open a session: ${describeArrayError(sessionResponse.status, sessionResponse.body)}`
          )
        );
      }

      const session = new FlashArraySession(endpoint, channel, sessionResponse.cookies.join('; '));
      if (signal?.aborted) {
        await session.disconnect();
        return fail(new CancelledError(`Connecting to array ${endpoint} was cancelled`));
      }

      logger.debug(`Opened session on array ${endpoint}`);
      return ok(session);
    } catch (error) {
      if (signal?.aborted) {
        return fail(new CancelledError(`Connecting to array ${endpoint} was cancelled`, error));
      }
      return fail(new ConnectionError(`Cannot reach array ${endpoint}: ${describeCause(error)}`, error));
    }
  }
}
