// Main entry points
export { checkSchemas, checkSchemasAsync } from './checkSchemas.js';
export type { CheckSchemasOptions } from './application/CallGuard.js';
export { defineSchema, defineSeriesSchema } from './domain/services/SchemaCompiler.js';
export { ValidationEngine } from './domain/services/ValidationEngine.js';
export type { ValidationEngineConfig } from './domain/services/ValidationEngine.js';
export { RecursiveInspector } from './application/RecursiveInspector.js';
export type { InspectionResult, InspectorConfig } from './application/RecursiveInspector.js';

// Domain model: declarations
export type { FieldDefinition, SemanticType, ColumnCheck, CheckVerdict } from './domain/model/FieldDefinition.js';
export { DTYPE_FOR_TYPE } from './domain/model/FieldDefinition.js';
export type { SchemaDefinition, SeriesSchemaDefinition, IndexDefinition, TableCheck } from './domain/model/Schema.js';
export type { CallSignature, ParameterDeclaration } from './domain/model/CallSignature.js';
export type { Annotation } from './domain/model/Annotation.js';
export {
  tableOf,
  seriesOf,
  sequenceOf,
  tupleOf,
  mappingOf,
  optionalOf,
  lazyOf,
  unchecked,
} from './domain/model/Annotation.js';
export type { FieldValue } from './domain/model/Values.js';
export { isMissing } from './domain/model/Values.js';

// Domain model: compiled schemas
export type {
  SchemaModel,
  SeriesSchemaModel,
  FieldSpec,
  IndexSpec,
  SchemaConfig,
  ColumnSelector,
} from './domain/model/SchemaModel.js';

// Domain model: results and errors
export type {
  ValidationError,
  StructuralError,
  CoercionError,
  ConstraintViolationError,
  StructuralErrorCode,
  ConstraintViolationCode,
  IssueScope,
  FailureCase,
  ValidationReport,
} from './domain/model/ValidationResult.js';
export { hasErrors, errorsOfKind, formatError } from './domain/model/ValidationResult.js';
export { SchemaDefinitionError, AggregateValidationError } from './domain/model/Errors.js';
export type { ValidationPhase } from './domain/model/Errors.js';
export { ValidationContext } from './domain/model/ValidationContext.js';
export type { PathSegment } from './domain/model/ValidationContext.js';

// Domain services
export { coerceValue } from './domain/services/Coercion.js';
export type { CastResult } from './domain/services/Coercion.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  EventPublisher,
  TableValidatedEvent,
  SeriesValidatedEvent,
  CallRejectedEvent,
} from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';
export type { EventBusOptions } from './application/EventBus.js';

// Ports
export type { Table, Series, SeriesData, ColumnData, IndexLevel, DType } from './domain/ports/Table.js';
export { isTable, isSeries } from './domain/ports/Table.js';

// Infrastructure adapters
export { InMemoryTable } from './infrastructure/tables/InMemoryTable.js';
export type { TableOptions } from './infrastructure/tables/InMemoryTable.js';
export { InMemorySeries } from './infrastructure/tables/InMemorySeries.js';
export type { SeriesOptions } from './infrastructure/tables/InMemorySeries.js';
export { inferDType } from './infrastructure/tables/columns.js';
export type { IndexLevelInput } from './infrastructure/tables/columns.js';
