// Path: src/lib/config/index.ts
// Configuration module re-exports

export { parseClientConfig } from './parser.js';
export {
  DEFAULT_CONFIG_FILE,
  resolveConfigPath,
  applyEnvOverrides,
  loadClientConfig,
} from './loader.js';
