/**
 * In-process background task runner built on unref'd timers
 */

import type { BackgroundTask, BackgroundTaskRunner } from '../interfaces';
import { createLogger, type Logger } from '../logger';

interface RegisteredTask {
  initial?: NodeJS.Timeout;
  interval?: NodeJS.Timeout;
  running: boolean;
}

/**
 * Runs registered tasks on timers that never keep the process alive.
 * A run that is still going when the next one is due is not overlapped.
 */
export class IntervalBackgroundRunner implements BackgroundTaskRunner {
  private readonly tasks = new Map<string, RegisteredTask>();

  constructor(private readonly logger: Logger = createLogger('IntervalBackgroundRunner')) {}

  register(task: BackgroundTask): void {
    this.cancel(task.name);

    const registered: RegisteredTask = { running: false };
    const fire = (): void => {
      if (registered.running) return;
      registered.running = true;
      void task
        .run()
        .catch((error: unknown) => {
          this.logger.error(`Background task ${task.name} failed`, error);
        })
        .finally(() => {
          registered.running = false;
        });
    };

    registered.initial = setTimeout(() => {
      registered.initial = undefined;
      fire();
      registered.interval = setInterval(fire, task.frequency);
      registered.interval.unref();
    }, task.initialDelay);
    registered.initial.unref();

    this.tasks.set(task.name, registered);
  }

  cancel(name: string): void {
    const registered = this.tasks.get(name);
    if (!registered) return;
    clearTimeout(registered.initial);
    clearInterval(registered.interval);
    this.tasks.delete(name);
  }

  isRegistered(name: string): boolean {
    return this.tasks.has(name);
  }
}
