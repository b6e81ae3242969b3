export {
  clearConversions,
  registerConversion,
  type ConvertFn,
  type ConvertibleType,
  type JsonConvertible,
} from "./convert"
export type { JsonSource, SourcePosition } from "./cursor"
export {
  BadAccessError,
  BadFormatError,
  BadValueError,
  JsonTreeError,
  type Encountered,
} from "./error"
export {
  Json,
  type JsonArray,
  type JsonData,
  type JsonInput,
  type JsonKey,
  type JsonObject,
  type JsonType,
} from "./json"
export { NodeRef, ref, type NodePointer, type NodeRefState } from "./nodeRef"
export {
  hasOption,
  ParseOption,
  type FloatFormat,
  type ParseOptions,
  type SerializeOptions,
} from "./options"
export { parse } from "./parser"
export { serialize } from "./serializer"
