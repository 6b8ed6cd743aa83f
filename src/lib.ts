/**
 * Library entry point
 */

export {
  QWeatherClient,
  GEO_API_URL,
  PUBLIC_ID_KEY,
  TIMESTAMP_KEY,
  WEATHER_API_URL,
  WEATHER_DEV_API_URL,
  type ClientConfig,
  type RequestOptions,
} from './domain/qweather-client.js';
export { canonicalize, compareBytes, CREDENTIAL_KEY, SIGNATURE_KEY } from './domain/canonical.js';
export { computeSignature, md5Hex, signParams, type DigestFn } from './domain/signer.js';
export {
  booleanField,
  coerceBoolean,
  coerceInteger,
  coerceNumber,
  integerField,
  numberField,
  optionalBooleanField,
  optionalField,
  optionalIntegerField,
  optionalNumberField,
  optionalStringField,
  requiredField,
  type Coerced,
  type Coercer,
} from './domain/coercion.js';
export { resolveEnvelope, SUCCESS_CODE } from './domain/envelope.js';
export {
  defineShapes,
  discriminate,
  shape,
  shapeSchema,
  type DecodeOutcome,
  type ShapeOf,
  type ShapeVariant,
} from './domain/shape.js';
export {
  DynamicEnvelopeSchema,
  MetadataEnvelopeSchema,
  ReferSchema,
  StaticEnvelopeSchema,
  type DynamicEnvelope,
  type MetadataEnvelope,
  type Refer,
  type StaticEnvelope,
} from './domain/schemas/envelope.js';
export { logger, type LogLevel } from './domain/logger.js';
export type { ApiResult, ErrorCode, ParamMap, QWeatherError, UnitSystem } from './domain/types.js';

export * from './api/weather.js';
export * from './api/grid-weather.js';
export * from './api/minutely.js';
export * from './api/warning.js';
export * from './api/indices.js';
export * from './api/tropical.js';
export * from './api/air-quality.js';
export * from './api/geo.js';
export * from './api/payloads.js';
export * from './api/schemas.js';
