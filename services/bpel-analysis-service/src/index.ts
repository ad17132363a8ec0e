import 'dotenv/config';
import { config } from './config';
import { createApp } from './app';
import { createRepository } from './services/repository';
import { isAnthropicConfigured } from './services/ai';
import { createLogger } from '../../../shared/utils';

const logger = createLogger(config.serviceName);
const repository = createRepository(config.databaseUrl);
const app = createApp({ repository, logger });

app.listen(config.port, () => {
  logger.info('Service started', {
    port: config.port,
    storage: repository.kind,
    anthropicConfigured: isAnthropicConfigured(),
  });
});
