import { createLogger, format, transports } from 'winston';
import type { Format } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type * as Transport from 'winston-transport';
import type { TransformableInfo } from 'logform';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

interface ConfigurableLoggerOptions {
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  /** Disable to log to the console only. */
  file?: boolean;
  showLocation?: boolean;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly showLocation: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.showLocation = options.showLocation ?? false;
    if (options.file !== false) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName || './logs/station-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize || '10m',
        maxFiles: options.maxFiles || '14d',
      });
      // Shared by every logger.
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    }));
  }

  /**
   * Waits until buffered lines reach the rotating log file.
   * Nothing may be logged through this factory afterwards.
   */
  public async flush(timeoutMs = 2_000): Promise<void> {
    const transport = this.fileTransport;
    if (!transport) {
      return;
    }
    await new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, timeoutMs);
      transport.once('finish', () => {
        clearTimeout(timer);
        resolve();
      });
      transport.close?.();
    });
  }

  protected createTransports(label: string): Transport[] {
    const list: Transport[] = [
      new transports.Console({
        format: format.combine(
          format.colorize(),
          this.getFormat(label),
        ),
      }),
    ];
    if (this.fileTransport) {
      list.push(this.fileTransport);
    }
    return list;
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.phase) {
          info.phase = store.phase;
        }
        return info;
      })(),
      format.printf(
        ({ level: levelInner, message, label: labelInner, timestamp, phase }: TransformableInfo): string => {
          const phaseInfo = typeof phase === 'string' ? ` [phase:${phase}]` : '';

          let displayLabel = String(labelInner);
          if (this.showLocation) {
            // Labels may be paths such as "supervisor/ServiceLauncher".
            const className = displayLabel.split('/').pop();
            if (className && className !== 'Object') {
              displayLabel = className;
            }
          }

          return `${String(timestamp)}${phaseInfo} [${displayLabel}] {${process.pid}} ${levelInner}: ${String(message)}`;
        },
      ),
    );
  }
}
