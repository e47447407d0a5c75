/* Folding logger that keeps the last TWO keys.
 * Prints "… repeated x N times" when a streak ends, using the summary text
 * when one was given so the count is not pinned to the first item.
 * Usage:
 *   const flog = new FoldLog(new Logger('outbox'));
 *   flog.line('transient|503', 'job 12 failed: Brevo API error 503');
 *   flog.flushAll() // at the end of a batch
 */
import type { LogLevel, Logger } from './logger';

type Entry = { key: string; line: string; summary: string; level: LogLevel; count: number };

export class FoldLog {
  private last0: Entry | null = null;
  private last1: Entry | null = null;

  constructor(private readonly logger: Logger) {}

  private print(level: LogLevel, line: string) {
    if (level === 'error') this.logger.error(line);
    else if (level === 'warn') this.logger.warn(line);
    else if (level === 'debug') this.logger.debug(line);
    else this.logger.info(line);
  }

  private flushEntry(e: Entry | null) {
    if (!e) return;
    if (e.count > 1) {
      // summary once the streak ends
      this.print(e.level, `${e.summary} … repeated x ${e.count} times`);
    }
  }

  /** Emit a (key,line). First time prints the line.
   *  Repeats with same key are buffered and later summarized.
   *  Keeps last two distinct keys; flushes the older one when a new third key appears.
   */
  line(key: string, line: string, level: LogLevel = 'info', summary = line) {
    if (this.last0 && this.last0.key === key) {
      this.last0.count++;
      return;
    }
    if (this.last1 && this.last1.key === key) {
      this.last1.count++;
      return;
    }

    if (this.last1) this.flushEntry(this.last1);

    this.last1 = this.last0;
    this.last0 = { key, line, summary, level, count: 1 };
    this.print(level, line);
  }

  /** Force-flush both buffers (end of batch / tests). */
  flushAll() {
    this.flushEntry(this.last1);
    this.last1 = null;
    this.flushEntry(this.last0);
    this.last0 = null;
  }
}

export default FoldLog;
