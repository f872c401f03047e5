import type { LoggerMethods } from '@pagescribe/logger';

import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { WORK_AREA } from '../config/constants';

/**
 * Format a date as local `YYYYMMDDHHmmss`
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');

  return (
    date.getFullYear().toString() +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

/**
 * Per-run scratch directory holding the materialized input and its rendered
 * pages. Disposed once at the end of the run.
 */
export class WorkArea {
  private disposed = false;

  private constructor(
    readonly path: string,
    private readonly logger: LoggerMethods,
  ) {}

  /**
   * Create `<root>/<YYYYMMDDHHmmss>`.
   */
  static create(
    logger: LoggerMethods,
    root: string = WORK_AREA.ROOT,
    now: Date = new Date(),
  ): WorkArea {
    const path = join(root, formatTimestamp(now));
    mkdirSync(path, { recursive: true });
    logger.debug(`[WorkArea] Created ${path}`);
    return new WorkArea(path, logger);
  }

  /**
   * Write the input document into the area.
   *
   * @param extension - Extension with leading dot, e.g. `.pdf`
   * @returns Path of the written file
   */
  materialize(data: Uint8Array, extension: string): string {
    const filePath = join(this.path, `${WORK_AREA.INPUT_BASENAME}${extension}`);
    writeFileSync(filePath, data);
    return filePath;
  }

  /**
   * Remove the area and everything in it. Later calls do nothing.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    rmSync(this.path, { recursive: true, force: true });
    this.logger.debug(`[WorkArea] Removed ${this.path}`);
  }
}
