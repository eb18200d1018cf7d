export {
  RecordCodec,
  describeKind,
  isReferenceTarget,
  sanitizeValue,
  toWire,
  assignSystemFields,
} from './record-codec';
export type { FieldClassification, ReferenceTarget } from './record-codec';
export { bytesToBase64, base64ToBytes } from './base64';
