export {
  validateSchemaDefinition,
  validateFieldDefinition,
  describeTypeSpecError,
  isValidSchemaName,
  isValidFieldName,
  type SchemaDefinitionResult,
  type SchemaDefinitionIssue,
  type SchemaDefinitionIssueCode,
} from './schema-definition.js';
