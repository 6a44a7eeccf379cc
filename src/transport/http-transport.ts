import Joi from 'joi';
import { Logger } from 'pino';
import { DeliveryError } from '../errors';
import { DeliveryResult, OutgoingRecord, Transport } from '../types/transport';
import { toWireBatch } from '../serialization/wire';

export interface HttpTransportOptions {
  endpoint: string;
  writeKey: string;
  logger?: Logger;
  fetch?: typeof fetch;
  now?: () => Date;
}

const partialFailureSchema = Joi.object<{ failed: string[] }>({
  failed: Joi.array<string[]>().items(Joi.string()).default([])
}).unknown(true);

const RETRYABLE_STATUS = new Set([408, 425, 429]);

/**
 * Posts batches as JSON to `<endpoint>/v1/batch`.
 *
 * 2xx is success, except 207 whose body lists the refused record ids.
 * 408, 425, 429 and 5xx are retryable; any other status fails the batch for good.
 */
export class HttpTransport implements Transport {
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: HttpTransportOptions) {
    this.url = `${options.endpoint.replace(/\/+$/, '')}/v1/batch`;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async send(batch: readonly OutgoingRecord[], signal: AbortSignal): Promise<DeliveryResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.options.writeKey}`
        },
        body: JSON.stringify(toWireBatch(batch, this.now())),
        signal
      });
    } catch (error) {
      this.options.logger?.debug({ error: error instanceof Error ? error.message : String(error) }, 'Collector request failed');
      return { ok: false, error: DeliveryError.from(error) };
    }

    if (response.status === 207) {
      const failedIds = await this.readFailedIds(response);
      if (failedIds.length === 0) {
        return { ok: true };
      }
      return {
        ok: false,
        error: new DeliveryError(`Collector refused ${failedIds.length} of ${batch.length} records`, {
          retryable: true,
          status: 207
        }),
        failedIds
      };
    }

    await this.discardBody(response);

    if (response.ok) {
      return { ok: true };
    }

    const retryable = RETRYABLE_STATUS.has(response.status) || response.status >= 500;
    return {
      ok: false,
      error: new DeliveryError(`Collector responded with status ${response.status}`, {
        retryable,
        status: response.status
      })
    };
  }

  /**
   * Releases the pooled connection of a response whose body is not read
   */
  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.options.logger?.debug({ error: error instanceof Error ? error.message : String(error) }, 'Could not discard response body');
    }
  }

  private async readFailedIds(response: Response): Promise<string[]> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.options.logger?.warn({ error: error instanceof Error ? error.message : String(error) }, 'Unreadable partial failure body');
      return [];
    }

    const { error, value } = partialFailureSchema.validate(body);
    if (error) {
      this.options.logger?.warn({ error: error.message }, 'Unexpected partial failure body');
      return [];
    }
    return value.failed;
  }
}
