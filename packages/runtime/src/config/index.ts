export { loadConfig, type AspectServiceConfig } from './config.js';
