import 'source-map-support/register';

import { LambdaLogger } from './lambdaLogger';

/**
 * An abstract class to inherit to handle requests with an AWS Lambda function.
 */
export abstract class GenericController<Event = unknown, Result = unknown> {
  protected event: Event;

  protected logger = new LambdaLogger();

  /**
   * Initialize a new GenericController helper object.
   * @param event the event that invoked the AWS lambda function
   */
  constructor(event: Event) {
    this.event = event;
  }

  /**
   * The main function (to override), that handles the request and returns its response.
   */
  abstract handleRequest(): Promise<Result>;

  /**
   * Remap an error to manage the logging and make sure no unhandled error is returned to the requester.
   */
  protected handleControllerError(
    err: unknown,
    interceptedInContext: string,
    replaceWithMessage: string
  ): HandledError | UnhandledError {
    if (err instanceof HandledError) return err;
    return new UnhandledError(err, interceptedInContext, replaceWithMessage);
  }
}

/**
 * A specific type of error in the context of the Controller, to distinguish from "unhandled" errors.
 * Its message is public: it's returned to the requester as is.
 */
export class HandledError extends Error {
  /**
   * The HTTP status code to answer with.
   */
  statusCode: number;
  /**
   * Public extra information on the error, if any.
   */
  details?: string;

  constructor(message: string, options: { statusCode?: number; details?: string } = {}) {
    super(message);
    this.name = 'HandledError';
    this.statusCode = options.statusCode ?? 400;
    this.details = options.details;
    Object.setPrototypeOf(this, HandledError.prototype);
  }
}

/**
 * A required field is missing from the body of the request.
 */
export class MissingFieldError extends HandledError {
  constructor(public field: string) {
    super(`missing required field: ${field}`, { statusCode: 400 });
    this.name = 'MissingFieldError';
    Object.setPrototypeOf(this, MissingFieldError.prototype);
  }
}

/**
 * A mandatory setting of the Lambda function's environment is missing.
 */
export class ConfigurationError extends HandledError {
  constructor(public setting: string) {
    super(`server configuration error: ${setting} missing`, { statusCode: 500 });
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * The storage service (or its client) reported a failure.
 */
export class StoreError extends HandledError {
  constructor(details: string) {
    super('dynamodb error', { statusCode: 502, details });
    this.name = 'StoreError';
    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

/**
 * The HTTP method of the request isn't served by the resource.
 */
export class UnsupportedMethodError extends HandledError {
  constructor() {
    super('unsupported method', { statusCode: 405 });
    this.name = 'UnsupportedMethodError';
    Object.setPrototypeOf(this, UnsupportedMethodError.prototype);
  }
}

/**
 * An unhandled error thrown inside the controller (i.e. `!(error instanceof HandledError)`).
 */
export class UnhandledError extends Error {
  statusCode = 500;
  /**
   * The context where the unhandled error was intercepted.
   */
  unhandled: string;
  /**
   * The original error message before it was replaced by a public-facing message.
   */
  internalMessage: string;
  /**
   * The name of the type of the original error; e.g. `TypeError`.
   */
  errorType: string;

  constructor(original: unknown, interceptedInContext: string, replaceWithMessage: string) {
    super(replaceWithMessage);
    this.name = 'UnhandledError';
    this.unhandled = interceptedInContext;
    this.internalMessage = original instanceof Error ? original.message : String(original);
    this.errorType = getErrorType(original);
    if (original instanceof Error) this.stack = original.stack;
    Object.setPrototypeOf(this, UnhandledError.prototype);
  }
}

/**
 * Get the name of the type of a thrown value; e.g. `TypeError` or `string`.
 */
export const getErrorType = (err: unknown): string => {
  if (err instanceof Error) return err.constructor.name !== 'Error' ? err.constructor.name : err.name;
  if (err === null) return 'null';
  return typeof err;
};
