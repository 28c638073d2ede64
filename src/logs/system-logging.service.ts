import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Log, LogActor, LogLevel } from './logs.entity';
import { Caller } from '../common/access/caller';

export interface LogEntry {
  action: string;
  module: string;
  level: LogLevel;
  performedBy?: LogActor;
  entityId?: string;
  entityType?: string;
  newValues?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export function actorOf(caller: Caller): LogActor {
  return { id: caller.userId, username: caller.username, role: caller.role };
}

@Injectable()
export class SystemLoggingService {
  private readonly logger = new Logger(SystemLoggingService.name);

  constructor(
    @InjectRepository(Log)
    private logRepository: Repository<Log>,
  ) {}

  async logAction(logEntry: LogEntry): Promise<void> {
    try {
      const log = this.logRepository.create({
        action: logEntry.action,
        module: logEntry.module,
        level: logEntry.level,
        performedBy: logEntry.performedBy ?? null,
        entityId: logEntry.entityId ?? null,
        entityType: logEntry.entityType ?? null,
        newValues: logEntry.newValues ?? null,
        metadata: {
          ...logEntry.metadata,
          timestamp: new Date().toISOString(),
        },
      });

      await this.logRepository.save(log);

      const message = `[${logEntry.module}] ${logEntry.action}`;
      const context = JSON.stringify({
        entityId: logEntry.entityId,
        entityType: logEntry.entityType,
        performedBy: logEntry.performedBy?.username,
      });

      switch (logEntry.level) {
        case 'error':
          this.logger.error(`${message} ${context}`);
          break;
        case 'warn':
          this.logger.warn(`${message} ${context}`);
          break;
        case 'debug':
          this.logger.debug(`${message} ${context}`);
          break;
        default:
          this.logger.log(`${message} ${context}`);
      }
    } catch (error) {
      // Audit failures never fail the request
      const stack = error instanceof Error ? error.stack : String(error);
      this.logger.error('Failed to save log entry', stack);
    }
  }

  async logAccountRegistered(userId: string, role: string, caller: Caller): Promise<void> {
    await this.logAction({
      action: 'ACCOUNT_REGISTERED',
      module: 'USERS',
      level: 'info',
      performedBy: actorOf(caller),
      entityId: userId,
      entityType: 'User',
      newValues: { role },
    });
  }

  async logRoleConverted(userId: string, role: string, profileId: string, caller: Caller): Promise<void> {
    await this.logAction({
      action: 'ROLE_CONVERTED',
      module: 'USERS',
      level: 'info',
      performedBy: actorOf(caller),
      entityId: userId,
      entityType: 'User',
      newValues: { role, profileId },
    });
  }

  async logDeactivated(entityType: string, entityId: string, caller: Caller): Promise<void> {
    await this.logAction({
      action: 'DEACTIVATED',
      module: entityType.toUpperCase(),
      level: 'info',
      performedBy: actorOf(caller),
      entityId,
      entityType,
      newValues: { isActive: false },
    });
  }
}
