export { loadConfig, type ProtoforgeConfig } from './config.js';
