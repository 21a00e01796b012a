import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createApp } from './infrastructure/http/createApp.js';

const container = new AppContainer();
const { config, logger } = container;

const start = async (): Promise<void> => {
  await container.prepareStorage();

  const app = createApp(container);
  app.listen(config.server.port, config.server.host, () => {
    logger.info(
      {
        port: config.server.port,
        host: config.server.host,
        environment: config.environment,
        storage: config.storage.driver,
      },
      'finance API listening',
    );
  });
};

start().catch((error: unknown) => {
  logger.fatal({ err: error }, 'failed to start');
  process.exitCode = 1;
});
