// Schema registry

export {
  Schema,
  SchemaRegistry,
  createSchemaRegistry,
  type CreateResult,
  type EmbeddableSchema,
  type SchemaRegistryOptions,
} from './registry.js';
