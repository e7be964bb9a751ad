import * as DDB from '@aws-sdk/lib-dynamodb';
import { DynamoDB as DDBClient, DynamoDBServiceException } from '@aws-sdk/client-dynamodb';
import { customAlphabet as AlphabetNanoID } from 'nanoid';
const NanoID = AlphabetNanoID('0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz', 25);

import { LambdaLogger } from './lambdaLogger';

/**
 * The names of the errors that the AWS SDK raises when the service can't be reached or signed for.
 */
const SDK_CLIENT_ERROR_NAMES = ['TimeoutError', 'RequestTimeout', 'NetworkingError', 'CredentialsProviderError'];
/**
 * The codes of the socket errors that surface through the AWS SDK's HTTP handler.
 */
const SOCKET_ERROR_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE'];

/**
 * The operations needed to create items, implemented by `DynamoDB`.
 */
export interface ItemStore {
  generateId(): string;
  put(params: DDB.PutCommandInput): Promise<DDB.PutCommandOutput>;
}

/**
 * A wrapper for AWS DynamoDB.
 */
export class DynamoDB implements ItemStore {
  client: DDB.DynamoDBDocument;
  protected logger = new LambdaLogger();

  constructor(options: { client?: DDB.DynamoDBDocument; region?: string } = {}) {
    this.client =
      options.client ??
      DDB.DynamoDBDocument.from(new DDBClient({ region: options.region }), {
        marshallOptions: { convertEmptyValues: true, removeUndefinedValues: true, convertClassInstanceToMap: true }
      });
  }

  /**
   * Returns a new random identifier, collision-negligible (25 alphanumeric characters).
   */
  generateId(): string {
    return NanoID();
  }

  /**
   * Put an item in a DynamoDB table (last write wins: no condition is applied).
   * @param params the params to apply to DynamoDB's function
   */
  async put(params: DDB.PutCommandInput): Promise<DDB.PutCommandOutput> {
    this.logger.trace(`Put ${params.TableName}`);
    return await this.client.put(params);
  }

  /**
   * Whether an error was raised by DynamoDB (e.g. throttling, validation) or by its client (e.g. connectivity).
   */
  static isClientError(err: unknown): err is Error {
    if (err instanceof DynamoDBServiceException) return true;
    if (!(err instanceof Error)) return false;
    if (SDK_CLIENT_ERROR_NAMES.includes(err.name)) return true;
    return 'code' in err && typeof err.code === 'string' && SOCKET_ERROR_CODES.includes(err.code);
  }
}
