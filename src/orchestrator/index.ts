export * from './types';
export { RefreshOrchestrator } from './refresh-orchestrator';
export { RefreshJournal } from './journal';
