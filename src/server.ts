import { createApp } from './app';
import { loadConfig } from './config';
import { RekognitionFaceGateway } from './modules/face/face.rekognition-gateway';

async function main(): Promise<void> {
  const config = loadConfig();
  const gateway = new RekognitionFaceGateway(config.rekognition);
  await gateway.ensureCollection();

  const app = createApp({ config, gateway });
  const server = app.listen(config.port, () => {
    console.log(`Server listening on port ${config.port} (${config.env})`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[Shutdown] ${signal} received, closing server`);
    server.close((error) => {
      if (error) {
        console.error('[Shutdown] Failed to close server cleanly:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  console.error('[Startup] Failed to start server:', error);
  process.exit(1);
});
