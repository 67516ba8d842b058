import Ajv, { type SchemaObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { type Logger, SilentLogger } from '../core/types/Logger';
import { describePkg, RSPCode } from '../protocol/constants';
import type { RequestModel } from '../protocol/RequestModel';
import { ResponseModel } from '../protocol/ResponseModel';

export type JsonSchema = SchemaObject;

/**
 * Returns a response to short-circuit the request with, or null to let the
 * handler run
 */
export type ValidatorCallback = (request: RequestModel, schema: JsonSchema) => ResponseModel | null;

export interface SchemaValidatorOptions {
  logger?: Logger;
}

const createAjv = (): Ajv => {
  const ajv = new Ajv({ allErrors: true, strict: false });
  addFormats(ajv);
  return ajv;
};

/**
 * Build a JSON Schema validator callback for `PackageRouter.register`.
 *
 * Schema violations are logged here and answered with a bare INVALID_DATA
 * response; the client never sees the schema errors.
 */
export const createSchemaValidator = (options: SchemaValidatorOptions = {}): ValidatorCallback => {
  const logger = options.logger ?? new SilentLogger();
  const ajv = createAjv();
  const compiled = new WeakMap<JsonSchema, ValidateFunction>();

  const compile = (schema: JsonSchema): ValidateFunction => {
    let validate = compiled.get(schema);
    if (!validate) {
      validate = ajv.compile(schema);
      compiled.set(schema, validate);
    }
    return validate;
  };

  return (request, schema) => {
    const validate = compile(schema);
    if (validate(request.data)) {
      return null;
    }

    logger.warn(`Invalid data for ${describePkg(request.pkgId)}`, {
      reqId: request.reqId,
      errors: ajv.errorsText(validate.errors),
    });
    return ResponseModel.err(request.pkgId, request.reqId, { statusCode: RSPCode.INVALID_DATA });
  };
};

/**
 * Validator with a silent logger
 */
export const validator: ValidatorCallback = createSchemaValidator();
