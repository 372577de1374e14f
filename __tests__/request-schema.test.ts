import { refreshRequestSchema } from '../src/types';
import { buildRequest } from './helpers/fakes';

function messages(input: unknown): string[] {
  const parsed = refreshRequestSchema.safeParse(input);
  return parsed.success ? [] : parsed.error.issues.map((issue) => issue.message);
}

describe('refreshRequestSchema', () => {
  test('accepts a complete request and trims names', () => {
    const parsed = refreshRequestSchema.parse(buildRequest({ databaseName: '  AppDb ', sourceInstance: 'SRC01\\REPORTING' }));

    expect(parsed.databaseName).toBe('AppDb');
    expect(parsed.sourceInstance).toBe('SRC01\\REPORTING');
  });

  test('reports every blank field', () => {
    expect(
      messages({
        databaseName: ' ',
        sourceInstance: '',
        destinationInstance: 'DST01',
        arrayEndpoint: 'array01.example',
        arrayCredentials: { username: '', password: '' },
      })
    ).toEqual([
      'database name is required',
      'source instance is required',
      'array username is required',
      'array password is required',
    ]);
  });

  test('rejects an array endpoint carrying a scheme or path', () => {
    expect(messages(buildRequest({ arrayEndpoint: 'https://array01/api' }))).toEqual([
      'array endpoint must be a host name or address',
    ]);
  });

  test('accepts bracketed IPv6 endpoints', () => {
    expect(messages(buildRequest({ arrayEndpoint: '[fd00::10]' }))).toEqual([]);
  });

  test('rejects database names longer than an identifier', () => {
    expect(refreshRequestSchema.safeParse(buildRequest({ databaseName: 'x'.repeat(129) })).success).toBe(false);
  });
});
