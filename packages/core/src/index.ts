// @agent-studio/core — persistence, sessions, agent gateway client, config

export * from './errors.js';
export * from './logger.js';
export * from './config/schema.js';
export * from './config/loader.js';
export * from './storage/chat-store.js';
export * from './session/manager.js';
export * from './agent/frame-queue.js';
export * from './agent/gateway-client.js';
