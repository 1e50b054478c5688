export { SessionManager, type SessionHandle, type SessionManagerOptions } from './SessionManager.js';
export { BrowserSession, LAUNCH_ARGS } from './BrowserSession.js';
export type {
  BackendFactory,
  BrowserBackend,
  BrowserBackendOptions,
  BrowserLaunchOptions,
  GotoResult,
} from './BrowserBackend.js';
