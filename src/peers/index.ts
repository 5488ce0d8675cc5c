export { StaticPeerDirectory, StorePeerDirectory, isHealthy } from './directory.js';
export type { PeerDirectory, StorePeerDirectoryOptions } from './directory.js';
export { PeerHeartbeat } from './heartbeat.js';
export type { PeerHeartbeatOptions } from './heartbeat.js';
