export { getTaskrelayDir, ensureTaskrelayDir, loadConfig, loadStoredConfig, saveConfig } from './loader.js';
