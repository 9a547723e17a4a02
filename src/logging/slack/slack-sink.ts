/**
 * Slack webhook output sink with buffering and retry
 *
 * Sends log messages to Slack via an incoming webhook for remote monitoring.
 * Features:
 * - Webhook URL from configuration (SLACK_WEBHOOK_URL)
 * - Buffers failed messages for retry
 * - Exponential backoff retry (1s, 2s, 4s, 8s...) capped at maxRetryDelayMs
 * - Drops oldest messages when buffer full
 * - Slack failures never reach the control loop
 */

import type { TimerAPI } from '$types';
import type { HttpPost, SlackSink, SlackSinkConfig } from '../types';

/**
 * Message in the retry buffer
 */
interface BufferedMessage {
  text: string;
  retries: number;
}

/**
 * HttpPost backed by the global fetch
 * @returns HttpPost that rejects on non-2xx responses
 */
export function createFetchPost(): HttpPost {
  return async function post(url: string, body: string): Promise<void> {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: body
    });
    if (!response.ok) {
      throw new Error('HTTP ' + response.status);
    }
  };
}

/**
 * Create a Slack sink with buffering and retry
 *
 * Failed messages are buffered and retried with exponential backoff.
 *
 * @param httpPost - Transport for the webhook call
 * @param timerApi - Timer API for retry scheduling
 * @param config - Slack sink configuration
 * @returns Slack sink instance
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink(createFetchPost(), createNodeTimer(), {
 *   enabled: true,
 *   webhookUrl: process.env.SLACK_WEBHOOK_URL ?? '',
 *   bufferSize: 10,
 *   retryDelayMs: 1000,
 *   maxRetryDelayMs: 60000,
 *   maxRetries: 5
 * });
 * ```
 */
export function createSlackSink(
  httpPost: HttpPost,
  timerApi: TimerAPI,
  config: SlackSinkConfig
): SlackSink {
  let initialized = false;
  const buffer: BufferedMessage[] = [];
  let retryTimerActive = false;
  let currentRetryDelay = config.retryDelayMs;

  function isActive(): boolean {
    return config.enabled && config.webhookUrl !== '';
  }

  function sendToSlack(
    message: BufferedMessage,
    onSuccess: () => void,
    onFailure: () => void
  ): void {
    let request: Promise<void>;
    try {
      request = httpPost(config.webhookUrl, JSON.stringify({ text: message.text }));
    } catch (err) {
      console.warn('Slack send exception: ' + String(err));
      onFailure();
      return;
    }

    request.then(onSuccess, function(err: unknown) {
      console.warn('Slack send failed: ' + (err instanceof Error ? err.message : String(err)));
      onFailure();
    });
  }

  /**
   * Process the retry buffer
   * Attempts to send the first message, schedules retry on failure
   */
  function processBuffer(): void {
    if (buffer.length === 0) {
      retryTimerActive = false;
      currentRetryDelay = config.retryDelayMs;
      return;
    }

    const message = buffer[0];

    sendToSlack(
      message,
      function onSuccess() {
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;

        if (buffer.length > 0) {
          processBuffer();
        } else {
          retryTimerActive = false;
        }
      },
      function onFailure() {
        message.retries++;

        if (message.retries >= config.maxRetries) {
          console.warn('Slack message dropped after ' + config.maxRetries + ' retries');
          buffer.shift();
          currentRetryDelay = config.retryDelayMs;
        } else {
          currentRetryDelay = Math.min(currentRetryDelay * 2, config.maxRetryDelayMs);
        }

        if (buffer.length > 0) {
          timerApi.set(currentRetryDelay, false, processBuffer);
        } else {
          retryTimerActive = false;
        }
      }
    );
  }

  /**
   * Initialize the sink by checking the webhook URL
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    initialized = true;

    if (!config.enabled) {
      callback(true, 'Slack disabled');
      return;
    }

    if (config.webhookUrl === '') {
      callback(false, 'Slack enabled but SLACK_WEBHOOK_URL is not set');
      return;
    }

    callback(true, 'Slack webhook configured');
  }

  /**
   * Write formatted message to Slack
   * Messages are sent immediately if possible, or buffered for retry
   * @param formattedMessage - Pre-formatted log message (already filtered by level)
   */
  function write(formattedMessage: string): void {
    if (!isActive()) {
      return;
    }

    const message: BufferedMessage = {
      text: formattedMessage,
      retries: 0
    };

    sendToSlack(
      message,
      function onSuccess() {
        // Delivered
      },
      function onFailure() {
        if (buffer.length >= config.bufferSize) {
          const dropped = buffer.shift();
          console.warn('Slack buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, 50) : ''));
        }
        buffer.push(message);

        if (!retryTimerActive) {
          retryTimerActive = true;
          timerApi.set(currentRetryDelay, false, processBuffer);
        }
      }
    );
  }

  function isInitialized(): boolean {
    return initialized;
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  return {
    write: write,
    initialize: initialize,
    isInitialized: isInitialized,
    getBufferSize: getBufferSize
  };
}
