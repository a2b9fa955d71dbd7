/**
 * Log Tail Reader
 *
 * Returns the last N lines of a file of unknown size by reading fixed-size
 * chunks backwards from EOF. Memory stays proportional to the tail actually
 * returned, and the total bytes read are capped by a hard ceiling.
 *
 * Architecture:
 * - Cursor starts at EOF and moves back min(chunkBytes, remaining) per read
 * - Chunks are prepended to a byte buffer; decoding happens once at the end
 *   so multi-byte characters split across chunks stay intact
 * - Stops when enough newlines are buffered, the cursor hits 0, or maxBytes
 *   have been read
 */

import { open, type FileHandle } from 'node:fs/promises';
import type { Logger } from 'pino';
import { LOG_TAIL } from '../config/defaults.js';
import { lazyLog } from '../utils/logger-helpers.js';

const NEWLINE = 0x0a;

export interface LogTailReaderOptions {
  /** Bytes per backward read (default: 8192) */
  chunkBytes?: number;

  /** Hard ceiling on bytes read per call (default: 5MB) */
  maxBytes?: number;

  logger?: Logger;
}

export interface LogTailReadStats {
  reads: number;
  bytesRead: number;
  fileSize: number;
  /** True when reading stopped at maxBytes before reaching the file start */
  truncated: boolean;
}

function countNewlines(buffer: Buffer): number {
  let count = 0;
  let index = buffer.indexOf(NEWLINE);
  while (index !== -1) {
    count++;
    index = buffer.indexOf(NEWLINE, index + 1);
  }
  return count;
}

export class LogTailReader {
  private readonly chunkBytes: number;
  private readonly maxBytes: number;
  private readonly logger?: Logger;

  private lastStats: LogTailReadStats = {
    reads: 0,
    bytesRead: 0,
    fileSize: 0,
    truncated: false,
  };

  constructor(options: LogTailReaderOptions = {}) {
    this.maxBytes = Math.max(1, options.maxBytes ?? LOG_TAIL.MAX_BYTES);
    this.chunkBytes = Math.max(1, Math.min(options.chunkBytes ?? LOG_TAIL.CHUNK_BYTES, this.maxBytes));
    this.logger = options.logger;
  }

  /**
   * Read the last `lineCount` lines of `filePath`, oldest first.
   *
   * Missing or unreadable files yield an empty array.
   */
  public async readLastLines(filePath: string, lineCount: number = LOG_TAIL.LINES): Promise<string[]> {
    this.lastStats = { reads: 0, bytesRead: 0, fileSize: 0, truncated: false };

    if (lineCount <= 0) {
      return [];
    }

    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r');
    } catch (error) {
      lazyLog(this.logger, 'debug', () => ({ filePath, err: error }), 'Log file not readable');
      return [];
    }

    try {
      const { size } = await handle.stat();
      this.lastStats.fileSize = size;

      if (size === 0) {
        return [];
      }

      let cursor = size;
      let buffer = Buffer.alloc(0);
      let newlines = 0;
      let endsWithNewline: boolean | undefined;

      while (cursor > 0 && this.lastStats.bytesRead < this.maxBytes) {
        const readSize = Math.min(this.chunkBytes, cursor, this.maxBytes - this.lastStats.bytesRead);
        cursor -= readSize;

        const chunk = Buffer.alloc(readSize);
        const { bytesRead } = await handle.read(chunk, 0, readSize, cursor);
        this.lastStats.reads++;
        this.lastStats.bytesRead += bytesRead;

        if (bytesRead === 0) {
          break;
        }

        const data = bytesRead === readSize ? chunk : chunk.subarray(0, bytesRead);
        if (endsWithNewline === undefined) {
          endsWithNewline = data[data.length - 1] === NEWLINE;
        }

        buffer = Buffer.concat([data, buffer]);
        newlines += countNewlines(data);

        // A final newline terminates the last line; it does not separate one
        const separators = endsWithNewline ? newlines - 1 : newlines;
        if (separators >= lineCount) {
          break;
        }
      }

      this.lastStats.truncated = cursor > 0 && this.lastStats.bytesRead >= this.maxBytes;

      const startsMidLine = cursor > 0 && !(await this.isLineStart(handle, cursor));
      const lines = this.splitTail(buffer, startsMidLine);

      lazyLog(
        this.logger,
        'debug',
        () => ({ filePath, ...this.lastStats, lines: Math.min(lines.length, lineCount) }),
        'Log tail read'
      );

      return lines.length > lineCount ? lines.slice(lines.length - lineCount) : lines;
    } catch (error) {
      this.logger?.warn({ filePath, err: error }, 'Failed reading log tail');
      return [];
    } finally {
      try {
        await handle.close();
      } catch (error) {
        this.logger?.warn({ filePath, err: error }, 'Failed closing log file');
      }
    }
  }

  /**
   * Read the tail and join it with newlines.
   */
  public async readTail(filePath: string, lineCount: number = LOG_TAIL.LINES): Promise<string> {
    const lines = await this.readLastLines(filePath, lineCount);
    return lines.join('\n');
  }

  /**
   * Counters for the most recent read.
   */
  public getStats(): LogTailReadStats {
    return { ...this.lastStats };
  }

  /**
   * True when the byte before `offset` is a newline.
   */
  private async isLineStart(handle: FileHandle, offset: number): Promise<boolean> {
    const previous = Buffer.alloc(1);
    const { bytesRead } = await handle.read(previous, 0, 1, offset - 1);
    return bytesRead === 1 && previous[0] === NEWLINE;
  }

  private splitTail(buffer: Buffer, startsMidLine: boolean): string[] {
    const lines = buffer.toString('utf8').split('\n');

    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }

    // The first segment is a fragment of a longer line when the buffer starts
    // mid-line; keep it only when it is all the ceiling allowed
    if (startsMidLine && lines.length > 1) {
      lines.shift();
    }

    return lines;
  }
}
