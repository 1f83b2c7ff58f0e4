export { SchemaRegistry } from './schema-registry.js';
export { projectRecord, unknownFields, applyAliases } from './projector.js';
