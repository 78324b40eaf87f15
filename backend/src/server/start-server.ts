import { Express } from 'express';
import { Server } from 'node:http';

interface StartServerOptions {
  app: Express;
  port: number;
  spotName: string;
}

export const startServer = ({ app, port, spotName }: StartServerOptions): Server => {
  const server = app.listen(port, () => console.log(`[server] forecasting ${spotName} on port ${port}`));

  const shutdown = (signal: string) => {
    console.log(`[server] received ${signal}, closing connections.`);
    server.close((err) => {
      if (err) {
        console.error('[server] shutdown failed:', err);
        process.exit(1);
      }
      process.exit(0);
    });

    setTimeout(() => {
      console.error('[server] connections still open after 10s, forcing exit.');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    console.error('[server] unhandled rejection:', reason);
  });
  process.on('uncaughtException', (error) => {
    console.error('[server] uncaught exception:', error);
    shutdown('uncaughtException');
  });

  return server;
};
