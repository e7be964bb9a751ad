import type { APIGatewayProxyEventV2, APIGatewayProxyEvent } from 'aws-lambda';

import { CloudWatchMetrics } from './metrics';
import { GenericController, HandledError, UnhandledError, UnsupportedMethodError } from './genericController';
import { JSONObject, isJSONObject, parseJSON, toJSONLine } from './json';

/**
 * A request invoked directly (e.g. from the console or another service), i.e. not through API Gateway.
 * The body can either be a structured value or its JSON-encoded string.
 */
export interface DirectRequestEvent {
  body?: unknown;
}

/**
 * The events that can invoke a resource controller.
 */
export type ResourceEvent = APIGatewayProxyEventV2 | APIGatewayProxyEvent | DirectRequestEvent;

/**
 * The response of a resource controller, compatible with API Gateway's proxy integration.
 */
export interface ResourceResponse {
  statusCode: number;
  body: string;
  headers: Record<string, string>;
}

const isEventV2 = (event: ResourceEvent): event is APIGatewayProxyEventV2 =>
  'requestContext' in event && 'version' in event && event.version === '2.0';
const isEventV1 = (event: ResourceEvent): event is APIGatewayProxyEvent =>
  'requestContext' in event && 'httpMethod' in event;

/**
 * An abstract class to inherit to manage API requests (AWS API Gateway) on a collection resource
 * in an AWS Lambda function.
 */
export abstract class ResourceController extends GenericController<ResourceEvent, ResourceResponse> {
  protected project?: string;
  protected stage?: string;
  protected resource?: string;
  protected serviceName?: string;
  protected httpMethod: string;
  protected path?: string;
  /**
   * The body of the request; always an object: a missing or malformed body is an empty object.
   */
  protected body: JSONObject;
  protected queryParams: Record<string, string | undefined>;

  protected metrics?: CloudWatchMetrics;

  constructor(event: ResourceEvent, options: ResourceControllerOptions = {}) {
    super(event);

    this.project = options.project;
    this.stage = options.stage;
    this.resource = options.resource;
    this.serviceName = options.serviceName;

    if (isEventV2(event)) {
      this.stage = this.stage ?? event.requestContext.stage;
      this.httpMethod = event.requestContext.http.method;
      this.path = event.rawPath;
      this.queryParams = event.queryStringParameters ?? {};
      this.body = this.normalizeBody(this.decodeBody(event.body, event.isBase64Encoded));
    } else if (isEventV1(event)) {
      this.stage = this.stage ?? event.requestContext.stage;
      this.httpMethod = event.httpMethod;
      this.path = event.path;
      this.queryParams = event.queryStringParameters ?? {};
      this.body = this.normalizeBody(this.decodeBody(event.body, event.isBase64Encoded));
    } else {
      // direct invocations can only create
      this.httpMethod = 'POST';
      this.queryParams = {};
      this.body = this.normalizeBody(event.body);
    }

    if (options.useMetrics) this.prepareMetrics();
  }
  private decodeBody(body: string | null | undefined, isBase64Encoded: boolean): string | undefined {
    if (!body) return undefined;
    return isBase64Encoded ? Buffer.from(body, 'base64').toString('utf-8') : body;
  }
  /**
   * Normalize the body of the request to an object: a JSON-encoded body is parsed (its numbers at full precision);
   * a body that can't be parsed, or that isn't an object, is considered empty.
   */
  protected normalizeBody(rawBody: unknown): JSONObject {
    let body = rawBody;
    if (typeof rawBody === 'string') {
      try {
        body = parseJSON(rawBody);
      } catch (error) {
        body = {};
      }
    }
    return isJSONObject(body) ? body : {};
  }
  protected getEventSummary(): Record<string, unknown> {
    return { httpMethod: this.httpMethod, path: this.path, queryParams: this.queryParams, body: this.body };
  }

  ///
  /// REQUEST HANDLERS
  ///

  async handleRequest(): Promise<ResourceResponse> {
    this.logger.debug('START', { event: this.getEventSummary() });

    try {
      if (this.httpMethod !== 'POST') throw new UnsupportedMethodError();
      const response = await this.postResources();
      return this.done(null, response);
    } catch (err) {
      return this.done(this.handleControllerError(err, 'HANDLER-ERROR', 'internal server error'));
    }
  }
  protected done(
    error: HandledError | UnhandledError | null,
    rawResult?: unknown,
    statusCode = error?.statusCode ?? 200
  ): ResourceResponse {
    let result: unknown;
    if (error instanceof UnhandledError) result = { error: error.message, details: error.internalMessage };
    else if (error)
      result = error.details === undefined ? { error: error.message } : { error: error.message, details: error.details };
    else result = rawResult ?? {};

    const finalLogContent = { statusCode, event: this.getEventSummary() };
    if (error) this.logger.debug('END-FAILED', { ...finalLogContent, error });
    else this.logger.debug('END-SUCCESS', finalLogContent);

    if (this.metrics) this.publishMetrics(statusCode, error);

    return {
      statusCode,
      body: toJSONLine(result),
      headers: { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' }
    };
  }

  /**
   * To @override
   */
  protected async postResources(): Promise<unknown> {
    throw new UnsupportedMethodError();
  }

  ///
  /// HELPERS
  ///

  /**
   * Prepare the CloudWatch metrics at the beginning of a request.
   */
  protected prepareMetrics(): void {
    this.metrics = new CloudWatchMetrics({ project: this.project, serviceName: this.serviceName });
    this.metrics.addDimension('stage', this.stage);
    this.metrics.addDimension('resource', this.resource);
    this.metrics.addDimension('method', this.httpMethod);
  }
  /**
   * Publish the CloudWatch metrics (default and custom-defined) at the end of a request.
   */
  protected publishMetrics(statusCode: number, error?: Error | null): void {
    if (!this.metrics) return;
    this.metrics.addMetric('request');
    this.metrics.addMetric('statusCode', statusCode);
    if (error) {
      this.metrics.addMetric('failed');
      this.metrics.addMetadata('error', error.name);
    } else this.metrics.addMetric('success');
    this.metrics.publishStoredMetrics();
  }
}

/**
 * The initial options for a constructor of class ResourceController.
 */
export interface ResourceControllerOptions {
  /**
   * The code of the project; used as namespace of the metrics.
   */
  project?: string;
  /**
   * The stage of the deployment; if not set, it's taken from the request context.
   */
  stage?: string;
  /**
   * The name of the resource served by the controller.
   */
  resource?: string;
  /**
   * The name of the service, for the metrics.
   */
  serviceName?: string;
  /**
   * Whether to automatically store usage metrics on CloudWatch.
   */
  useMetrics?: boolean;
}
