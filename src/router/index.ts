export { PackageRouter } from './PackageRouter';
export type { PackageHandler, PackageRouterConfig, RegisterOptions } from './PackageRouter';
export { hasPermission } from './permissions';
export type { RoleBearer } from './permissions';
export { createSchemaValidator, validator } from './validation';
export type { JsonSchema, ValidatorCallback, SchemaValidatorOptions } from './validation';
export { withErrorHandling } from './errorHandling';
export type { ErrorHandlingOptions } from './errorHandling';
