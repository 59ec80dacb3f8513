/**
 * File System Adapter
 * Implements the report and event file interfaces for domains
 */

import { open, writeFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Result } from '../../shared/result.js';
import { failure, success } from '../../shared/result.js';
import type { FileOpener, TextFileSink } from '../../domains/formatting/event-handler.js';
import type { FileWriter } from '../../domains/reporting/junit-writer.js';

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Sink over an open file handle
 */
class FileHandleSink implements TextFileSink {
  constructor(private readonly handle: FileHandle) {}

  async write(text: string): Promise<Result<void, Error>> {
    try {
      await this.handle.write(text);
      return success(undefined);
    } catch (error) {
      return failure(toError(error));
    }
  }

  async close(): Promise<Result<void, Error>> {
    try {
      await this.handle.close();
      return success(undefined);
    } catch (error) {
      return failure(toError(error));
    }
  }
}

/**
 * node:fs based file system adapter
 */
class NodeFileSystemAdapter implements FileOpener, FileWriter {
  async openForWriting(path: string): Promise<Result<TextFileSink, Error>> {
    try {
      const handle = await open(path, 'w');
      return success(new FileHandleSink(handle));
    } catch (error) {
      return failure(toError(error));
    }
  }

  async write(path: string, content: string): Promise<Result<void, Error>> {
    try {
      await writeFile(path, content, 'utf8');
      return success(undefined);
    } catch (error) {
      return failure(toError(error));
    }
  }
}

/**
 * Create file system adapter
 */
export function createFileSystemAdapter(): FileOpener & FileWriter {
  return new NodeFileSystemAdapter();
}
