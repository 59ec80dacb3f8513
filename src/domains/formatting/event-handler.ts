/**
 * Event handler that prints formatted events and records them to a file
 */

import type { Result } from '../../shared/result.js';
import { failure, success } from '../../shared/result.js';
import type { DomainError } from '../../shared/errors.js';
import { createDomainError } from '../../shared/errors.js';
import type { Colors } from '../../core/colors.js';
import type { OutputWriter } from '../../types/output-writer.js';
import type { Execution } from '../event-scanning/execution.js';
import type { EventHandler, TestEvent } from '../event-scanning/types.js';
import type { EventFormatter } from './formatters.js';
import { createFormatter } from './formatters.js';

/**
 * A text file open for writing (implemented by infrastructure)
 */
export interface TextFileSink {
  write(text: string): Promise<Result<void, Error>>;
  close(): Promise<Result<void, Error>>;
}

/**
 * Opens a file for writing, truncating it (implemented by infrastructure)
 */
export interface FileOpener {
  openForWriting(path: string): Promise<Result<TextFileSink, Error>>;
}

/**
 * Handler settings taken from the run options
 */
export interface EventHandlerConfig {
  readonly format: string;
  /** Every raw event line is copied here when non-empty */
  readonly jsonFile: string;
}

/**
 * Writes formatted events to `out`, diagnostic lines to `err`
 */
export class FormattingEventHandler implements EventHandler {
  private closed = false;

  private constructor(
    private readonly formatter: EventFormatter,
    private readonly out: OutputWriter,
    private readonly errOut: OutputWriter,
    private readonly jsonFile: { path: string; sink: TextFileSink } | undefined,
  ) {}

  /**
   * Resolve the format and open the event file
   */
  static async create(
    config: EventHandlerConfig,
    io: { out: OutputWriter; err: OutputWriter },
    colors: Colors,
    files: FileOpener,
  ): Promise<Result<FormattingEventHandler, DomainError>> {
    const formatter = createFormatter(config.format, colors);
    if (!formatter.ok) {
      return formatter;
    }

    if (config.jsonFile === '') {
      return success(new FormattingEventHandler(formatter.data, io.out, io.err, undefined));
    }

    const opened = await files.openForWriting(config.jsonFile);
    if (!opened.ok) {
      return failure(eventFileFailed(config.jsonFile, 'failed to open JSON file', opened.error));
    }
    return success(
      new FormattingEventHandler(formatter.data, io.out, io.err, {
        path: config.jsonFile,
        sink: opened.data,
      }),
    );
  }

  async event(event: TestEvent, execution: Execution): Promise<Result<void, DomainError>> {
    if (this.jsonFile) {
      const written = await this.jsonFile.sink.write(event.raw + '\n');
      if (!written.ok) {
        return failure(
          eventFileFailed(this.jsonFile.path, 'failed to write JSON file', written.error),
        );
      }
    }

    const text = this.formatter(event, execution);
    if (text !== '') {
      this.out.write(text);
    }
    return success(undefined);
  }

  err(line: string): Promise<Result<void, DomainError>> {
    this.errOut.write(line + '\n');
    return Promise.resolve(success(undefined));
  }

  /**
   * Close the event file; later calls do nothing
   */
  async close(): Promise<Result<void, DomainError>> {
    if (this.closed || !this.jsonFile) {
      return success(undefined);
    }
    this.closed = true;
    const result = await this.jsonFile.sink.close();
    if (!result.ok) {
      return failure(eventFileFailed(this.jsonFile.path, 'failed to close JSON file', result.error));
    }
    return success(undefined);
  }
}

const eventFileFailed = (path: string, what: string, cause: Error): DomainError =>
  createDomainError({
    domain: 'reporting',
    kind: 'EventFileFailed',
    message: `${what} ${path}: ${cause.message}`,
    path,
    cause,
  });
