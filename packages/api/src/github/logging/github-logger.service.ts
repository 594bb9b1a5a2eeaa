import * as path from 'path';
import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import * as winston from 'winston';
import DailyRotateFile = require('winston-daily-rotate-file');
import { SensitiveDataFilter } from './sensitive-data.filter';

/**
 * GitHub Operation Types
 */
export enum GitHubOperation {
  // App-level operations
  GET_INSTALLATION = 'github.installation.get',
  CREATE_INSTALLATION_TOKEN = 'github.installation_token.create',

  // Repository reads
  GET_COMMIT = 'github.commit.get',
  COMPARE_COMMITS = 'github.commit.compare',
  GET_CONTENT = 'github.content.get',
  GET_REPOSITORY = 'github.repository.get',
  LIST_LANGUAGES = 'github.languages.list',
  LIST_TOPICS = 'github.topics.list',
  LIST_COMMIT_STATUSES = 'github.commit_status.list',

  // Mutations
  CREATE_COMMIT_STATUS = 'github.commit_status.create',
}

export type OperationStatus = 'success' | 'error' | 'pending';

/**
 * Log entry interface
 */
export interface GitHubLogEntry {
  timestamp: string;
  level: string;
  requestId?: string;
  operation: string;
  duration?: number;
  status: OperationStatus;
  error?: {
    message: string;
    name: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

/**
 * Audit log entry for mutations
 */
export interface AuditLogEntry extends GitHubLogEntry {
  resourceType: string;
}

export interface OperationLogOptions {
  requestId?: string;
  duration?: number;
  error?: Error;
  metadata?: Record<string, unknown>;
}

/**
 * Handle returned by startOperation
 */
export interface OperationHandle {
  requestId: string;
  endOperation: (status: 'success' | 'error', error?: Error) => void;
}

/**
 * GitHub Logger Service
 *
 * Structured JSON logging for every GitHub call:
 * - Winston JSON lines with timestamps and error stacks
 * - Sensitive data filtering on all metadata
 * - Separate audit stream for mutations
 * - Request tracing via requestId
 * - Daily log rotation; stderr fallback when a logger fails
 */
@Injectable()
export class GitHubLoggerService implements OnModuleDestroy {
  private logger: winston.Logger | null = null;
  private auditLogger: winston.Logger | null = null;
  private readonly isDevelopment: boolean;
  private readonly toFile: boolean;
  private readonly directory: string;
  private readonly level: string;

  constructor(private readonly configService: ConfigService) {
    this.isDevelopment =
      this.configService.get<string>('app.environment', 'development') === 'development';
    this.toFile = this.configService.get<boolean>('logging.toFile', true);
    this.directory = this.configService.get<string>('logging.directory', 'logs');
    this.level = this.configService.get<string>(
      'logging.level',
      this.isDevelopment ? 'debug' : 'info',
    );
  }

  /**
   * Log a GitHub operation
   */
  log(
    operation: GitHubOperation | string,
    status: OperationStatus,
    options: OperationLogOptions = {},
  ): void {
    try {
      const entry: GitHubLogEntry = {
        timestamp: new Date().toISOString(),
        level: status === 'error' ? 'error' : 'info',
        requestId: options.requestId,
        operation,
        duration: options.duration,
        status,
      };

      if (options.error) {
        entry.error = {
          message: SensitiveDataFilter.filterString(options.error.message),
          name: options.error.name,
          stack: options.error.stack,
        };
      }

      if (options.metadata) {
        entry.metadata = SensitiveDataFilter.filterObject(options.metadata);
      }

      this.getLogger().log(entry.level, { ...entry, message: entry.operation });

      if (this.isMutation(operation)) {
        this.logAudit(entry);
      }
    } catch (error) {
      this.logToStderr({
        level: 'ERROR',
        message: 'Failed to log operation',
        operation,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Log operation start; the handle logs the outcome with its duration
   */
  startOperation(
    operation: GitHubOperation | string,
    metadata?: Record<string, unknown>,
  ): OperationHandle {
    const requestId = uuidv4();
    const startTime = Date.now();

    this.log(operation, 'pending', { requestId, metadata });

    return {
      requestId,
      endOperation: (status: 'success' | 'error', error?: Error) => {
        this.log(operation, status, {
          requestId,
          duration: Date.now() - startTime,
          error,
          metadata,
        });
      },
    };
  }

  /**
   * Clean up resources
   */
  onModuleDestroy(): void {
    this.logger?.end();
    this.auditLogger?.end();
    this.logger = null;
    this.auditLogger = null;
  }

  private getLogger(): winston.Logger {
    if (!this.logger) {
      this.logger = winston.createLogger({
        level: this.level,
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.errors({ stack: true }),
          winston.format.json(),
        ),
        defaultMeta: { service: 'github-access' },
        transports: this.createMainTransports(),
        // Don't exit on errors
        exitOnError: false,
      });
      this.attachFallback(this.logger, 'Logger error');
    }
    return this.logger;
  }

  private getAuditLogger(): winston.Logger {
    if (!this.auditLogger) {
      this.auditLogger = winston.createLogger({
        level: 'info',
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        defaultMeta: { service: 'github-audit' },
        transports: this.createAuditTransports(),
        exitOnError: false,
      });
      this.attachFallback(this.auditLogger, 'Audit logger error');
    }
    return this.auditLogger;
  }

  private createMainTransports(): winston.transport[] {
    const transports: winston.transport[] = [];

    if (this.isDevelopment || !this.toFile) {
      transports.push(
        new winston.transports.Console({
          silent: !this.isDevelopment,
          format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        }),
      );
    }

    if (this.toFile) {
      transports.push(
        new DailyRotateFile({
          filename: path.join(this.directory, 'github-operations-%DATE%.log'),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: winston.format.json(),
        }),
        new DailyRotateFile({
          filename: path.join(this.directory, 'github-errors-%DATE%.log'),
          datePattern: 'YYYY-MM-DD',
          level: 'error',
          maxSize: '20m',
          maxFiles: '30d',
          format: winston.format.json(),
        }),
      );
    }

    return transports;
  }

  private createAuditTransports(): winston.transport[] {
    if (!this.toFile) {
      return [new winston.transports.Console({ silent: true })];
    }
    return [
      new DailyRotateFile({
        filename: path.join(this.directory, 'github-audit-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        maxSize: '50m',
        maxFiles: '90d',
        format: winston.format.json(),
      }),
    ];
  }

  private logAudit(entry: GitHubLogEntry): void {
    if (entry.status === 'pending') {
      return;
    }
    try {
      const auditEntry: AuditLogEntry = {
        ...entry,
        resourceType: this.getResourceType(entry.operation),
      };
      this.getAuditLogger().info({ ...auditEntry, message: entry.operation });
    } catch (error) {
      this.logToStderr({
        level: 'ERROR',
        message: 'Failed to log audit entry',
        operation: entry.operation,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private attachFallback(logger: winston.Logger, message: string): void {
    logger.on('error', (error: Error) => {
      this.logToStderr({ level: 'ERROR', message, error: error.message });
    });
  }

  private isMutation(operation: string): boolean {
    return operation.endsWith('.create');
  }

  private getResourceType(operation: string): string {
    const parts = operation.split('.');
    return parts.length > 1 ? parts[1] : 'unknown';
  }

  /**
   * Fallback logging to stderr
   */
  private logToStderr(data: Record<string, unknown>): void {
    process.stderr.write(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        ...data,
      }) + '\n',
    );
  }
}
