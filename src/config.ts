/**
 * The default location of the log file; in a Lambda function, `/tmp` is the only writable (ephemeral) folder.
 */
export const DEFAULT_LOG_FILE_PATH = '/tmp/create_movie.jsonl';

/**
 * The process-wide configuration, read once when the Lambda function's container starts.
 */
export interface ServiceConfig {
  /**
   * The DynamoDB table where to store the movies; its absence is a configuration error, raised on request.
   */
  tableName?: string;
  /**
   * The JSON Lines file where the log entries are appended.
   */
  logFilePath: string;
  /**
   * The code of the project, used as metrics namespace.
   */
  project?: string;
  /**
   * The stage of the deployment; e.g. `dev` or `prod`.
   */
  stage?: string;
  /**
   * The name of the API resource served by the function; e.g. `movies`.
   */
  resource?: string;
  /**
   * The name of the service, composed of project, stage and resource.
   */
  serviceName: string;
  /**
   * Whether to publish usage metrics on CloudWatch.
   */
  useMetrics: boolean;
}

/**
 * Read the configuration from the environment.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const { TABLE_NAME, LOG_FILE_PATH, PROJECT, STAGE, RESOURCE, USE_METRICS } = env;
  return {
    tableName: TABLE_NAME || undefined,
    logFilePath: LOG_FILE_PATH || DEFAULT_LOG_FILE_PATH,
    project: PROJECT,
    stage: STAGE,
    resource: RESOURCE,
    serviceName: [PROJECT, STAGE, RESOURCE].filter(x => x).join('_'),
    useMetrics: USE_METRICS === 'true'
  };
};
