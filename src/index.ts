export * from './errors.js';
export * from './logger.js';
export * from './utils.js';
export * from './config.js';
export * from './identity/keypair.js';
export * from './message/envelope.js';
export * from './message/types/handshake.js';
export * from './message/types/session.js';
export * from './policy/sharing-policy.js';
export * from './policy/context-filter.js';
export * from './policy/modes.js';
export * from './policy/relationship-cache.js';
export * from './registry/peer.js';
export * from './registry/peer-store.js';
export * from './discovery/backoff.js';
export * from './discovery/discovery-service.js';
export * from './handshake/handshake.js';
export * from './handshake/protocol.js';
export * from './session/session.js';
export * from './session/session-manager.js';
export * from './session/context-publisher.js';
export * from './transport/types.js';
export * from './transport/frame-queue.js';
export * from './transport/memory.js';
export * from './transport/websocket.js';
export * from './transport/udp-discovery.js';
export * from './providers/json-files.js';
export * from './service.js';
