export * from './types';
export {
  ClientMessage,
  parseClientMessage,
  type ClientMessageTag,
} from './client_message';
export {
  SERVER_MESSAGE_TAGS,
  ServerMessage,
  parseServerMessage,
  type ServerMessageOf,
  type ServerMessageTag,
} from './server_message';
