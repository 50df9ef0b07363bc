import { processBatch } from './batch.js';
import { DEFAULT_DETECT_POLLING, resolveConfig, type ClientConfig, type ClientConfigInput } from './config.js';
import { InvalidRequestError } from './errors.js';
import { HttpClient, apiPaths, type Transport } from './http.js';
import { createLogger, type Logger } from './logger.js';
import { normalizeAnalysis } from './normalize.js';
import { fetchResultsPage } from './pages.js';
import { pollResult, type WaitFn } from './poller.js';
import { parseWith, rawAnalysisPayloadSchema } from './schema.js';
import type {
  BatchOptions,
  DetectionResult,
  DetectionResultPage,
  GetResultOptions,
  GetResultsOptions,
  SocialMediaUploadOptions,
  UploadDescriptor,
  UploadHandle,
  UploadOptions,
} from './types.js';
import { uploadDescriptor, uploadFile, uploadSocialMedia } from './upload.js';

export interface AuthenticityClientOptions extends ClientConfigInput {
  apiKey: string;
  transport?: Transport;
  logger?: Logger;
  wait?: WaitFn;
}

export class AuthenticityClient {
  readonly config: ClientConfig;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly wait?: WaitFn;

  constructor(options: AuthenticityClientOptions) {
    this.config = resolveConfig(options);
    this.logger = options.logger ?? createLogger();
    this.transport = options.transport ?? new HttpClient(this.config, this.logger);
    this.wait = options.wait;
  }

  async upload(options: UploadOptions): Promise<UploadHandle> {
    return uploadFile(this.transport, options.filePath, options.signal);
  }

  async uploadSocialMedia(options: SocialMediaUploadOptions): Promise<UploadHandle> {
    return uploadSocialMedia(this.transport, options.socialLink, options.signal);
  }

  /**
   * Fetches the result for `requestId`. Pass both `maxAttempts` and
   * `pollingIntervalMs` to wait until the analysis leaves the ANALYZING state.
   */
  async getResult(requestId: string, options: GetResultOptions = {}): Promise<DetectionResult> {
    if (!requestId) {
      throw new InvalidRequestError('requestId is required');
    }

    const { signal, ...policy } = options;
    return pollResult(requestId, (id, attemptSignal) => this.fetchResult(id, attemptSignal), {
      policy,
      signal,
      wait: this.wait,
      logger: this.logger,
    });
  }

  async getResults(options: GetResultsOptions = {}): Promise<DetectionResultPage> {
    return fetchResultsPage(options, {
      transport: this.transport,
      wait: this.wait,
      logger: this.logger,
    });
  }

  /**
   * Uploads every input and, when a polling policy is given, waits for each
   * result. Items whose upload or polling fails are left out of the output.
   */
  async processBatch(inputs: readonly UploadDescriptor[], options: BatchOptions = {}): Promise<DetectionResult[]> {
    return processBatch(inputs, options, {
      upload: (input, signal) => uploadDescriptor(this.transport, input, signal),
      getResult: (requestId, policy, signal) => this.getResult(requestId, { ...policy, signal }),
      logger: this.logger,
    });
  }

  async detectFile(filePath: string, options: GetResultOptions = {}): Promise<DetectionResult> {
    const handle = await this.upload({ filePath, signal: options.signal });
    return this.getResult(handle.requestId, {
      maxAttempts: options.maxAttempts ?? DEFAULT_DETECT_POLLING.maxAttempts,
      pollingIntervalMs: options.pollingIntervalMs ?? DEFAULT_DETECT_POLLING.pollingIntervalMs,
      signal: options.signal,
    });
  }

  private async fetchResult(requestId: string, signal?: AbortSignal): Promise<DetectionResult> {
    const json = await this.transport.get(
      `${apiPaths.mediaResult}/${encodeURIComponent(requestId)}`,
      undefined,
      signal,
    );
    return normalizeAnalysis(parseWith(rawAnalysisPayloadSchema, json, 'analysis result'));
  }
}
