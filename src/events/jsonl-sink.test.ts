/**
 * Tests for JSON-lines serialisation
 */

import { createJsonlSink, toJsonLine } from './jsonl-sink';
import type { JsonlFiles } from './jsonl-sink';
import type { ControlEvent } from './types';

describe('toJsonLine', () => {
  it('should write one event per line with its tag', () => {
    const line = toJsonLine({ type: 'safety', timestamp: 5, payload: { from: 'normal', to: 'stopped', reason: 'emergency stop asserted' } });

    expect(line).toBe('{"type":"safety","timestamp":5,"payload":{"from":"normal","to":"stopped","reason":"emergency stop asserted"}}\n');
  });

  it('should keep a null value and drop absent fields', () => {
    const line = toJsonLine({
      type: 'reading',
      timestamp: 0,
      payload: { sourceId: 'soil', kind: 'moisture', value: null, unit: '%', timestamp: 0, valid: false, error: 'timeout' }
    });

    expect(JSON.parse(line)).toEqual({
      type: 'reading',
      timestamp: 0,
      payload: { sourceId: 'soil', kind: 'moisture', value: null, unit: '%', timestamp: 0, valid: false, error: 'timeout' }
    });
    expect(line.endsWith('}\n')).toBe(true);
  });
});

describe('createJsonlSink', () => {
  const event: ControlEvent = { type: 'safety', timestamp: 5, payload: { from: 'normal', to: 'stopped', reason: 'emergency stop asserted' } };

  function createFiles(mkdirFailures: number): JsonlFiles & { dirs: string[]; lines: string[] } {
    let failuresLeft = mkdirFailures;
    const dirs: string[] = [];
    const lines: string[] = [];
    return {
      dirs: dirs,
      lines: lines,
      mkdir: function(dir: string) {
        dirs.push(dir);
        if (failuresLeft > 0) {
          failuresLeft--;
          return Promise.reject(new Error('EACCES'));
        }
        return Promise.resolve(undefined);
      },
      appendFile: function(file: string, data: string) {
        lines.push(file + ' ' + data);
        return Promise.resolve();
      }
    };
  }

  it('should create the directory once and append each event', async () => {
    const files = createFiles(0);
    const sink = createJsonlSink('data/events.jsonl', files);

    await sink.append(event);
    await sink.append(event);

    expect(files.dirs).toEqual(['data']);
    expect(files.lines).toEqual([
      'data/events.jsonl ' + toJsonLine(event),
      'data/events.jsonl ' + toJsonLine(event)
    ]);
  });

  it('should retry the directory after a failed mkdir', async () => {
    const files = createFiles(1);
    const sink = createJsonlSink('data/events.jsonl', files);

    await expect(sink.append(event)).rejects.toThrow('EACCES');
    await sink.append(event);

    expect(files.dirs).toEqual(['data', 'data']);
    expect(files.lines).toEqual(['data/events.jsonl ' + toJsonLine(event)]);
  });
});
