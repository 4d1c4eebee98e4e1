import { MalformedMessageError, UnknownMessageVariantError } from '../../lib/errors';
import { parseJson, stringifyJson, type JsonObject, type JsonValue } from '../../lib/json';
import { bytesToBase64, JsonReader } from '../../lib/json_reader';
import {
  CallReducerFlags,
  type CallReducer,
  type OneOffQuery,
  type QueryId,
  type Subscribe,
  type SubscribeMulti,
  type SubscribeSingle,
  type Unsubscribe,
  type UnsubscribeMulti,
} from './types';

/**
 * Every message a client can send. On the wire a message is an object with a
 * single key, the variant name, whose value is the payload.
 */
export type ClientMessage =
  | { tag: 'CallReducer'; value: CallReducer }
  | { tag: 'Subscribe'; value: Subscribe }
  | { tag: 'OneOffQuery'; value: OneOffQuery }
  | { tag: 'SubscribeSingle'; value: SubscribeSingle }
  | { tag: 'SubscribeMulti'; value: SubscribeMulti }
  | { tag: 'Unsubscribe'; value: Unsubscribe }
  | { tag: 'UnsubscribeMulti'; value: UnsubscribeMulti };

export type ClientMessageTag = ClientMessage['tag'];

function queryIdToJson(queryId: QueryId): JsonObject {
  return { id: queryId.id };
}

function readQueryId(reader: JsonReader): QueryId {
  return { id: reader.field('id').asU32() };
}

function readStrings(reader: JsonReader): string[] {
  return reader.asArray().map(r => r.asString());
}

function readFlags(reader: JsonReader): CallReducerFlags {
  const flags = reader.asU8();
  if (flags === CallReducerFlags.FullUpdate) return CallReducerFlags.FullUpdate;
  if (flags === CallReducerFlags.NoSuccessNotify) {
    return CallReducerFlags.NoSuccessNotify;
  }
  throw new MalformedMessageError(reader.path, 'call reducer flags (0 or 1)', String(flags));
}

export const ClientMessage = {
  CallReducer: (value: CallReducer): ClientMessage => ({ tag: 'CallReducer', value }),
  Subscribe: (value: Subscribe): ClientMessage => ({ tag: 'Subscribe', value }),
  OneOffQuery: (value: OneOffQuery): ClientMessage => ({ tag: 'OneOffQuery', value }),
  SubscribeSingle: (value: SubscribeSingle): ClientMessage => ({
    tag: 'SubscribeSingle',
    value,
  }),
  SubscribeMulti: (value: SubscribeMulti): ClientMessage => ({
    tag: 'SubscribeMulti',
    value,
  }),
  Unsubscribe: (value: Unsubscribe): ClientMessage => ({ tag: 'Unsubscribe', value }),
  UnsubscribeMulti: (value: UnsubscribeMulti): ClientMessage => ({
    tag: 'UnsubscribeMulti',
    value,
  }),

  toJson(message: ClientMessage): JsonObject {
    switch (message.tag) {
      case 'CallReducer': {
        const v = message.value;
        return {
          CallReducer: {
            reducer: v.reducer,
            args: v.args,
            request_id: v.requestId,
            flags: v.flags,
          },
        };
      }
      case 'Subscribe':
        return {
          Subscribe: {
            query_strings: message.value.queryStrings,
            request_id: message.value.requestId,
          },
        };
      case 'OneOffQuery':
        return {
          OneOffQuery: {
            message_id: bytesToBase64(message.value.messageId),
            query_string: message.value.queryString,
          },
        };
      case 'SubscribeSingle':
        return {
          SubscribeSingle: {
            query: message.value.query,
            request_id: message.value.requestId,
            query_id: queryIdToJson(message.value.queryId),
          },
        };
      case 'SubscribeMulti':
        return {
          SubscribeMulti: {
            query_strings: message.value.queryStrings,
            request_id: message.value.requestId,
            query_id: queryIdToJson(message.value.queryId),
          },
        };
      case 'Unsubscribe':
      case 'UnsubscribeMulti':
        return {
          [message.tag]: {
            request_id: message.value.requestId,
            query_id: queryIdToJson(message.value.queryId),
          },
        };
    }
  },

  fromJson(json: JsonValue): ClientMessage {
    return ClientMessage.fromReader(new JsonReader(json));
  },

  fromReader(reader: JsonReader): ClientMessage {
    const [tag, p] = reader.asTagged();
    switch (tag) {
      case 'CallReducer':
        return ClientMessage.CallReducer({
          reducer: p.field('reducer').asString(),
          args: p.field('args').asString(),
          requestId: p.field('request_id').asU32(),
          flags: readFlags(p.field('flags')),
        });
      case 'Subscribe':
        return ClientMessage.Subscribe({
          queryStrings: readStrings(p.field('query_strings')),
          requestId: p.field('request_id').asU32(),
        });
      case 'OneOffQuery':
        return ClientMessage.OneOffQuery({
          messageId: p.field('message_id').asBytes(),
          queryString: p.field('query_string').asString(),
        });
      case 'SubscribeSingle':
        return ClientMessage.SubscribeSingle({
          query: p.field('query').asString(),
          requestId: p.field('request_id').asU32(),
          queryId: readQueryId(p.field('query_id')),
        });
      case 'SubscribeMulti':
        return ClientMessage.SubscribeMulti({
          queryStrings: readStrings(p.field('query_strings')),
          requestId: p.field('request_id').asU32(),
          queryId: readQueryId(p.field('query_id')),
        });
      case 'Unsubscribe':
        return ClientMessage.Unsubscribe({
          requestId: p.field('request_id').asU32(),
          queryId: readQueryId(p.field('query_id')),
        });
      case 'UnsubscribeMulti':
        return ClientMessage.UnsubscribeMulti({
          requestId: p.field('request_id').asU32(),
          queryId: readQueryId(p.field('query_id')),
        });
      default:
        throw new UnknownMessageVariantError(tag, 'client');
    }
  },

  serialize(message: ClientMessage): string {
    return stringifyJson(ClientMessage.toJson(message));
  },

  deserialize(text: string): ClientMessage {
    return ClientMessage.fromJson(parseJson(text));
  },
};

/**
 * Decode one client frame. Fails with a decode error for malformed JSON, an
 * unknown variant or a payload of the wrong shape.
 */
export function parseClientMessage(text: string): ClientMessage {
  return ClientMessage.deserialize(text);
}
