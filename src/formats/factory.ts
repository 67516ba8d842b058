import { FORMAT } from '../core/constants';
import { JsonFormatStrategy } from './JsonFormatStrategy';
import type { MessageFormatStrategy } from './MessageFormatStrategy';
import { ProtobufFormatStrategy } from './ProtobufFormatStrategy';

export interface SelectStrategyOptions {
  /**
   * Accept `PROTOBUF`, `Protobuf`, ... as well. Off by default: only the exact
   * string `protobuf` selects the binary format.
   */
  caseInsensitive?: boolean;
}

const jsonStrategy = new JsonFormatStrategy();
const protobufStrategy = new ProtobufFormatStrategy();

/**
 * Pick the wire format for a connection. Anything that is not `protobuf`,
 * including unknown names and the empty string, gets JSON.
 */
export const selectStrategy = (
  formatName: string,
  options: SelectStrategyOptions = {}
): MessageFormatStrategy => {
  const name = options.caseInsensitive ? formatName.toLowerCase() : formatName;
  return name === FORMAT.PROTOBUF ? protobufStrategy : jsonStrategy;
};
