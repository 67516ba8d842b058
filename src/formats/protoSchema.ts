import { join } from 'node:path';
import { loadSync, type Type } from 'protobufjs';

/**
 * Location of the WebSocket frame schema; resolves the same from src/ and dist/
 */
export const PROTO_PATH = join(__dirname, '..', '..', 'proto', 'websocket.proto');

const root = loadSync(PROTO_PATH);

// protobufjs camel-cases field names: pkg_id -> pkgId, data_json -> dataJson
export const RequestProto: Type = root.lookupType('wspkg.Request');
export const ResponseProto: Type = root.lookupType('wspkg.Response');
