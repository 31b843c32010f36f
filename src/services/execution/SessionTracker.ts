/**
 * SessionTracker
 *
 * Files the engine created or modified during the current run, plus a log of
 * the errors it fixed. Files it recognises are overwritten without asking.
 * One instance per run, carried in the ExecutionContext.
 */

import path from 'path';
import { TEXT_LIMITS } from './constants/Timeouts';
import type { ErrorLogEntry } from './types/ExecutionTypes';

function clockTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export class SessionTracker {
  private createdFiles = new Set<string>();
  private modifiedFiles = new Set<string>();
  private errorLog: ErrorLogEntry[] = [];

  trackCreated(filePath: string): void {
    this.createdFiles.add(path.resolve(filePath));
  }

  trackModified(filePath: string): void {
    this.modifiedFiles.add(path.resolve(filePath));
  }

  /**
   * Whether the file was created or modified by this run
   */
  isOwnFile(filePath: string): boolean {
    const key = path.resolve(filePath);
    return this.createdFiles.has(key) || this.modifiedFiles.has(key);
  }

  logErrorFix(error: string, fix: string, file: string | null = null): void {
    this.errorLog.push({
      timestamp: clockTime(new Date()),
      error: error.substring(0, TEXT_LIMITS.ERROR_LOG_ENTRY),
      fix,
      file,
    });
  }

  getErrorLog(): ErrorLogEntry[] {
    return [...this.errorLog];
  }

  getCreatedFiles(): Set<string> {
    return new Set(this.createdFiles);
  }

  getModifiedFiles(): Set<string> {
    return new Set(this.modifiedFiles);
  }

  reset(): void {
    this.createdFiles.clear();
    this.modifiedFiles.clear();
    this.errorLog = [];
  }
}
