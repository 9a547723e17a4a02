/**
 * JSON-lines file event sink
 *
 * One event per line, appended. The file and its directory are created on
 * first write.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { ControlEvent, EventSink } from './types';

/**
 * Serialise an event to a single JSON line
 * @param event - Event to serialise
 * @returns Line including the trailing newline
 */
export function toJsonLine(event: ControlEvent): string {
  return JSON.stringify(event) + '\n';
}

/**
 * File operations the sink needs
 */
export interface JsonlFiles {
  /** Create a directory and its parents */
  mkdir(dir: string): Promise<unknown>;
  appendFile(file: string, data: string): Promise<void>;
}

const NODE_FILES: JsonlFiles = {
  mkdir: function(dir) { return mkdir(dir, { recursive: true }); },
  appendFile: function(file, data) { return appendFile(file, data, 'utf8'); }
};

/**
 * Create a JSON-lines sink writing to a file
 * @param path - Target file
 * @param files - File operations, Node's by default
 * @returns Event sink
 */
export function createJsonlSink(path: string, files: JsonlFiles = NODE_FILES): EventSink {
  let ready: Promise<unknown> | null = null;

  function ensureDirectory(): Promise<unknown> {
    if (ready !== null) {
      return ready;
    }
    // A failed mkdir is retried on the next append
    const created = files.mkdir(dirname(path)).catch(function(err: unknown) {
      ready = null;
      throw err;
    });
    ready = created;
    return created;
  }

  async function append(event: ControlEvent): Promise<void> {
    await ensureDirectory();
    await files.appendFile(path, toJsonLine(event));
  }

  return {
    append: append
  };
}
