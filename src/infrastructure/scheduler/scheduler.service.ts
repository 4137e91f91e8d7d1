import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import * as cron from 'node-cron';

export type TaskHandler = () => Promise<unknown> | unknown;

export interface ScheduledTask {
  name: string;
  cronExpression: string;
  task: TaskHandler;
  running: boolean;
  lastRunAt?: Date;
  lastError?: string;
}

export interface ScheduledTaskStatus {
  name: string;
  cronExpression: string;
  running: boolean;
  lastRunAt?: string;
  lastError?: string;
}

/**
 * Registry of recurring cron tasks (node-cron, UTC). One registration per
 * task name; a run is skipped while the previous one is still in flight.
 */
@Injectable()
export class SchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  private tasks: Map<string, cron.ScheduledTask> = new Map();
  private taskMetadata: Map<string, ScheduledTask> = new Map();

  onModuleInit() {
    this.logger.log('SchedulerService ready to accept task registrations');
  }

  onModuleDestroy() {
    this.logger.log('Stopping all scheduled tasks...');
    this.stopAll();
  }

  isRegistered(name: string): boolean {
    return this.tasks.has(name);
  }

  /**
   * Registers a cron task once.
   *
   * @returns false when a task with that name already exists or the expression is invalid
   */
  registerTask(name: string, cronExpression: string, task: TaskHandler): boolean {
    if (this.tasks.has(name)) {
      this.logger.debug(`Task "${name}" is already scheduled, keeping the existing schedule`);
      return false;
    }

    if (!cron.validate(cronExpression)) {
      this.logger.error(`Invalid cron expression "${cronExpression}" for task "${name}"`);
      return false;
    }

    const metadata: ScheduledTask = {
      name,
      cronExpression,
      task,
      running: false,
    };
    this.taskMetadata.set(name, metadata);

    const scheduledTask = cron.schedule(cronExpression, () => void this.runTask(name), {
      scheduled: true,
      timezone: 'UTC',
    });

    this.tasks.set(name, scheduledTask);
    this.logger.log(`Registered scheduled task "${name}" with expression "${cronExpression}"`);
    return true;
  }

  /**
   * Runs a registered task now, honouring the no-overlap rule
   *
   * @returns false when the task is unknown or already running
   */
  async runTask(name: string): Promise<boolean> {
    const taskMeta = this.taskMetadata.get(name);
    if (!taskMeta) {
      this.logger.error(`Task metadata not found for "${name}"`);
      return false;
    }

    if (taskMeta.running) {
      this.logger.debug(`Task "${name}" is already running, skipping this execution`);
      return false;
    }

    taskMeta.running = true;
    taskMeta.lastRunAt = new Date();
    const startTime = Date.now();

    try {
      this.logger.log(`Executing scheduled task: ${name}`);
      await taskMeta.task();
      taskMeta.lastError = undefined;
      this.logger.log(`Task "${name}" completed successfully in ${Date.now() - startTime}ms`);
    } catch (error) {
      taskMeta.lastError = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Task "${name}" failed after ${Date.now() - startTime}ms: ${taskMeta.lastError}`,
        error instanceof Error ? error.stack : undefined,
      );
    } finally {
      taskMeta.running = false;
    }
    return true;
  }

  stopTask(name: string): void {
    const task = this.tasks.get(name);
    if (task) {
      task.stop();
      this.tasks.delete(name);
      this.taskMetadata.delete(name);
      this.logger.log(`Stopped task "${name}"`);
    }
  }

  stopAll(): void {
    for (const [name, task] of this.tasks.entries()) {
      task.stop();
      this.logger.log(`Stopped task "${name}"`);
    }
    this.tasks.clear();
    this.taskMetadata.clear();
  }

  getStatus(): ScheduledTaskStatus[] {
    return Array.from(this.taskMetadata.values()).map((meta) => ({
      name: meta.name,
      cronExpression: meta.cronExpression,
      running: meta.running,
      lastRunAt: meta.lastRunAt?.toISOString(),
      lastError: meta.lastError,
    }));
  }
}
