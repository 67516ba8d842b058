export { JsonFormatStrategy } from './JsonFormatStrategy';
export {
  ProtobufFormatStrategy,
  encodeProtoRequest,
  decodeProtoRequest,
  encodeProtoResponse,
  decodeProtoResponse,
} from './ProtobufFormatStrategy';
export { selectStrategy } from './factory';
export type { SelectStrategyOptions } from './factory';
export { isBinaryFrame } from './MessageFormatStrategy';
export type {
  MessageFormatStrategy,
  RawFrame,
  ResponseFrame,
  SerializedFrame,
} from './MessageFormatStrategy';
