import { describeError } from './logger';

export interface SignalContext {
  onShutdown: () => Promise<void>;
  /** Runs on SIGHUP. A failure is logged and the process keeps running. */
  onReload?: () => void | Promise<void>;
  logger: {
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
  };
}

export function setupSignalHandlers(ctx: SignalContext): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      ctx.logger.warn('Forced exit on second signal', { signal });
      process.exit(1);
    }

    shuttingDown = true;
    ctx.logger.info('Received shutdown signal', { signal });

    try {
      await ctx.onShutdown();
      process.exit(0);
    } catch (err) {
      ctx.logger.warn('Error during shutdown', describeError(err));
      process.exit(1);
    }
  };

  const reload = async () => {
    if (shuttingDown || !ctx.onReload) return;
    ctx.logger.info('Received reload signal', { signal: 'SIGHUP' });
    try {
      await ctx.onReload();
      ctx.logger.info('Configuration reloaded');
    } catch (err) {
      ctx.logger.warn('Reload failed, keeping current settings', describeError(err));
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGHUP', () => void reload());
}
