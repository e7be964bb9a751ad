import { loadConfig } from './config';
import { CreateMovieController } from './createMovieController';
import { DynamoDB } from './dynamoDB';
import { EventLogger, FileLogSink } from './logger';
import { ResourceEvent, ResourceResponse } from './resourceController';

const config = loadConfig();
const store = new DynamoDB();
const eventLogger = new EventLogger({ secondary: new FileLogSink(config.logFilePath) });

/**
 * Lambda function's entry point to create a movie (`POST /movies`, or direct invocation).
 */
export const handler = (event: ResourceEvent): Promise<ResourceResponse> =>
  new CreateMovieController(event, {
    config,
    store,
    eventLogger,
    project: config.project,
    stage: config.stage,
    resource: config.resource,
    serviceName: config.serviceName,
    useMetrics: config.useMetrics
  }).handleRequest();
