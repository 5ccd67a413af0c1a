export { decode, decodeJson } from "./core/decode.js"
export {
  type AppError,
  type DecodeError,
  optionsError,
  type OptionsError,
  renderDecodeError,
  renderError,
  unexpectedEndOfBuffer,
  type UnexpectedEndOfBuffer,
  unexpectedToken,
  type UnexpectedToken
} from "./core/errors.js"
export type { Json } from "./core/json.js"
export {
  type DecodeOptions,
  defaultMaxDepth,
  parseDecodeOptions,
  resolveDecodeOptions,
  type ResolvedDecodeOptions
} from "./core/options.js"
export { parseStringLiteral, type StringLiteral } from "./core/string.js"
export {
  arrayValue,
  type ArrayValue,
  boolValue,
  type BoolValue,
  nullValue,
  type NullValue,
  numberValue,
  type NumberValue,
  objectValue,
  type ObjectValue,
  stringValue,
  type StringValue,
  toJson,
  type Value
} from "./core/value.js"
export { decodeText, decodeTextToJson } from "./shell/decode.js"
