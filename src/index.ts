export * from './database/index.js';
export {
  joinShellwords,
  quoteShellword,
  ShellwordsError,
  splitShellwords,
  type ShellwordsErrorCode,
} from './shell/shellwords.js';
export {
  DEFAULT_DATABASE_FILE,
  loadOptionalConfig,
  resolveDatabasePath,
  type CompdbConfig,
} from './dx/config.js';
export { isDebugEnabled, setDebugEnabled } from './dx/logger.js';
