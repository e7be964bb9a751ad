import { PutCommandOutput } from '@aws-sdk/lib-dynamodb';

import { ServiceConfig } from './config';
import { DynamoDB, ItemStore } from './dynamoDB';
import { ConfigurationError, MissingFieldError, StoreError, getErrorType } from './genericController';
import { JSONValue, toJSONSafe } from './json';
import { EventLogger } from './logger';
import { ResourceController, ResourceControllerOptions, ResourceEvent } from './resourceController';

/**
 * A movie, as stored in the table.
 */
export type MovieRecord = {
  /**
   * The tenant owning the movie (partition key).
   */
  tenant_id: string;
  /**
   * The unique identifier generated on creation.
   */
  id: string;
  /**
   * The data of the movie, as supplied by the requester; it's never validated nor shaped.
   */
  pelicula_datos: JSONValue;
};

/**
 * The result of the creation of a movie.
 */
export interface MovieCreated {
  pelicula: MovieRecord;
  /**
   * The response of the storage service, converted to plain JSON.
   */
  dynamodb_response: JSONValue;
}

/**
 * The options to create a new instance of `CreateMovieController`.
 */
export interface CreateMovieControllerOptions extends ResourceControllerOptions {
  config: ServiceConfig;
  store: ItemStore;
  eventLogger: EventLogger;
}

/**
 * Create movies: validate the request, store the movie and log the outcome (one entry per request).
 */
export class CreateMovieController extends ResourceController {
  protected config: ServiceConfig;
  protected store: ItemStore;
  protected eventLogger: EventLogger;

  constructor(event: ResourceEvent, options: CreateMovieControllerOptions) {
    super(event, options);
    this.config = options.config;
    this.store = options.store;
    this.eventLogger = options.eventLogger;
  }

  protected async postResources(): Promise<MovieCreated> {
    const tenantId = this.body.tenant_id;
    if (typeof tenantId !== 'string' || !tenantId) throw this.missingField('tenant_id');
    const movieData = this.body.pelicula_datos;
    if (movieData === undefined) throw this.missingField('pelicula_datos');

    const tableName = this.config.tableName;
    if (!tableName) {
      this.eventLogger.error({ action: 'env_check', message: 'TABLE_NAME not set in environment' });
      throw new ConfigurationError('TABLE_NAME');
    }

    const pelicula: MovieRecord = { tenant_id: tenantId, id: this.store.generateId(), pelicula_datos: movieData };

    let response: PutCommandOutput;
    try {
      response = await this.store.put({ TableName: tableName, Item: pelicula });
    } catch (err) {
      if (DynamoDB.isClientError(err)) {
        this.eventLogger.error({
          action: 'create_movie',
          status: 'dynamodb_failed',
          error_message: err.message,
          pelicula
        });
        throw new StoreError(err.message);
      }
      this.eventLogger.error({
        action: 'create_movie',
        status: 'failed_unexpected',
        error_type: getErrorType(err),
        error_message: err instanceof Error ? err.message : String(err),
        pelicula
      });
      throw err;
    }

    this.eventLogger.info({
      action: 'create_movie',
      status: 'success',
      pelicula,
      dynamodb_response_metadata: response.$metadata
    });
    return { pelicula, dynamodb_response: toJSONSafe(response) };
  }

  private missingField(field: string): MissingFieldError {
    this.eventLogger.error({
      action: 'parse_input',
      message: 'missing required field in body',
      missing_field: field,
      body: this.body
    });
    return new MissingFieldError(field);
  }
}
