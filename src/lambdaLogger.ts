export type LambdaLogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

/**
 * Manage lifecycle logging in the context of a Lambda function.
 * Note: the log level is controlled by each Lambda function's configuration (`AWS_LAMBDA_LOG_LEVEL`);
 * when it isn't set, the threshold is `INFO`.
 */
export class LambdaLogger {
  // note: this is needed as long as the Lambda functions don't become reactive to changes to `AWS_LAMBDA_LOG_LEVEL`
  shouldLog = (logLevel: LambdaLogLevel): boolean =>
    LOG_LEVELS_PRIORITY[logLevel] >= LOG_LEVELS_PRIORITY[getLambdaLogLevel()];

  trace = (summary: string, content: object = {}): void => {
    if (this.shouldLog('TRACE')) console.trace({ summary, ...content });
  };

  debug = (summary: string, content: object = {}): void => {
    if (this.shouldLog('DEBUG')) console.debug({ summary, ...content });
  };

  info = (summary: string, content: object = {}): void => {
    if (this.shouldLog('INFO')) console.info({ summary, ...content });
  };

  warn = (summary: string, error: unknown, content: object = {}): void => {
    if (this.shouldLog('WARN')) console.warn({ summary, ...content, error });
  };

  error = (summary: string, error: unknown, content: object = {}): void => {
    if (this.shouldLog('ERROR')) console.error({ summary, ...content, error });
  };
}

// levels here are identical to bunyan practices (https://github.com/trentm/node-bunyan#levels)
export const LOG_LEVELS_PRIORITY: Record<LambdaLogLevel, number> = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60
};

const isLambdaLogLevel = (value: string | undefined): value is LambdaLogLevel =>
  value !== undefined && Object.keys(LOG_LEVELS_PRIORITY).includes(value);

/**
 * Get the current log level for the Lambda function's `LambdaLogger`.
 * Note: "FATAL" means that no log will be printed.
 */
export const getLambdaLogLevel = (): LambdaLogLevel => {
  const level = process.env.AWS_LAMBDA_LOG_LEVEL?.toUpperCase();
  return isLambdaLogLevel(level) ? level : 'INFO';
};
/**
 * Set the log level for the Lambda function's `LambdaLogger`.
 */
export const setLambdaLogLevel = (logLevel: LambdaLogLevel): void => {
  process.env.AWS_LAMBDA_LOG_LEVEL = logLevel;
};
