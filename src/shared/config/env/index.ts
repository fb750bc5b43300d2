export { getServerConfig, parseServerConfig, type ServerConfig } from './server';
