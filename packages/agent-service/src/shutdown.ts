/** What shutdown needs from a node:http Server. */
export interface ClosableServer {
  close(callback: (err?: Error) => void): unknown;
}

export interface ShutdownTargets {
  scheduler: { stop(): Promise<void>; waitForIdle(timeoutMs: number): Promise<boolean> };
  server?: ClosableServer;
  closeDb: () => Promise<void>;
  /** How long in-flight tasks get to finish. */
  drainTimeoutMs: number;
}

function closeServer(server: ClosableServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export function createShutdownHandler(targets: ShutdownTargets): () => Promise<void> {
  let shuttingDown: Promise<void> | null = null;

  const shutdown = async () => {
    console.log('[shutdown] Stopping scheduler...');
    try {
      await targets.scheduler.stop();
    } catch (err) {
      console.error('Error stopping scheduler:', err);
    }

    try {
      const idle = await targets.scheduler.waitForIdle(targets.drainTimeoutMs);
      if (!idle) console.warn(`[shutdown] Tasks still running after ${targets.drainTimeoutMs}ms, closing anyway`);
    } catch (err) {
      console.error('Error waiting for tasks:', err);
    }

    const { server } = targets;
    const results = await Promise.allSettled([
      server ? closeServer(server) : Promise.resolve(),
      targets.closeDb(),
    ]);
    const labels = ['HTTP server', 'database'];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        console.error(`Error closing ${labels[index]}:`, result.reason);
      }
    });
    console.log('[shutdown] Done');
  };

  // SIGINT and SIGTERM may both arrive; the second waits on the first.
  return () => {
    shuttingDown ??= shutdown();
    return shuttingDown;
  };
}
