/**
 * @formcodec/core
 * Bidirectional codec between bracket-keyed form payloads and typed values.
 */

// Result type
export {
  type Result,
  Ok,
  Err,
  ok,
  err,
} from './types/result.js';

// Descriptors
export {
  type Descriptor,
  type DescriptorKind,
  type ScalarDescriptor,
  type StringDescriptor,
  type IntegerDescriptor,
  type BigIntDescriptor,
  type FloatDescriptor,
  type BooleanDescriptor,
  type DynamicDescriptor,
  type OptionalDescriptor,
  type ArrayDescriptor,
  type MapDescriptor,
  type RecordDescriptor,
  type CustomDescriptor,
  type FieldDescriptor,
  type FieldSpec,
  type FieldMap,
  type StringCodec,
  type CustomCodec,
  type IntegerBits,
  type FloatBits,
  type Infer,
  type InferFields,
  describe,
  isFieldDescriptor,
  isScalarDescriptor,
} from './types/descriptor.js';
export { schema } from './schema/builders.js';
export {
  type DynamicValue,
  type DynamicMap,
  isDynamicMap,
  isDynamicValue,
} from './types/dynamic.js';

// Schema cache and tags
export { parseTag, type FieldTag } from './schema/tags.js';
export {
  SchemaCache,
  defaultSchemaCache,
  type ResolvedField,
  type SchemaCacheStats,
} from './schema/schema-cache.js';

// Paths
export {
  parseKey,
  namedSegment,
  INDEX_SEGMENT,
  type PathSegment,
} from './path/path-parser.js';
export { renderPath } from './path/render.js';

// Engines
export { assign, type AssignContext } from './codec/decode.js';
export { infer } from './codec/infer.js';
export { encodeValue, type EncodeContext } from './codec/encode.js';
export {
  FormCodec,
  defaultCodec,
  decode,
  decodeInto,
  encode,
  type CallOptions,
} from './codec/form-codec.js';

// Flat multimap and streams
export {
  parseFlat,
  serializeFlat,
  sortPairs,
  type FlatPair,
  type FlatMultimap,
  type ParseFlatOptions,
  type SerializeFlatOptions,
} from './flat/flat-multimap.js';
export {
  FormDecoder,
  FormEncoder,
  type ByteSource,
} from './stream/form-stream.js';

// Descriptor documents
export {
  descriptorFromDocument,
  validateDescriptorDocument,
  type DescriptorDocument,
} from './document/descriptor-document.js';
export { valueFromJson, jsonReplacer } from './document/json-values.js';

// Options
export {
  type CodecOptions,
  type GuardsOptions,
  type ResolvedOptions,
  DEFAULT_OPTIONS,
  resolveOptions,
} from './types/options.js';

// Errors
export {
  FormCodecError,
  PathSyntaxError,
  FormDataError,
  UnknownFieldError,
  InvalidRootError,
  UnsupportedMapKeyError,
  SequenceSegmentError,
  CoercionError,
  UnsupportedKindError,
  CodecHookError,
  InvalidTargetError,
  ConfigError,
  InputLimitError,
  InternalError,
  isFormCodecError,
  isSensitiveName,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export {
  ErrorCode,
  type ErrorKind,
  type Severity,
  getErrorKind,
  getExitCode,
  getHttpStatus,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type APIErrorView,
  type ProductionView,
  type PresenterOptions,
} from './errors/presenter.js';
export { didYouMean, calculateDistance } from './errors/suggestions.js';

// Metrics
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsSnapshot,
  type MetricsCollectorOptions,
} from './util/metrics.js';
