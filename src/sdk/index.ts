export * from './client_api';
export * from './connection';
export * from './client_cache';
export * from './db_client';
export * from './db_client_builder';
export * from './event_emitter';
export * from './http_api';
export * from './id_allocator';
export * from './logger';
export * from './pending_requests';
export * from './subscription_handle';
export * from './websocket_adapter';
export { default as WebsocketTestAdapter } from './websocket_test_adapter';
