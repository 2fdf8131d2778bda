export { deserializeRecord, type DeserializeContext } from './deserialize.js';
