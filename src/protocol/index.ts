export { RSPCode, PkgID, describeCode, describePkg, NIL_UUID } from './constants';
export {
  createRequest,
  RequestFieldsSchema,
  RequestFrameSchema,
} from './RequestModel';
export type { RequestModel, RequestFields, RequestFrame } from './RequestModel';
export { ResponseModel, createBroadcast, isMetadataModel } from './ResponseModel';
export type {
  MetadataModel,
  ResponseMeta,
  ResponseData,
  ResponseOptions,
  ErrorResponseOptions,
  BroadcastModel,
} from './ResponseModel';
