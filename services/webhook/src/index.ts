import 'dotenv/config';
import { createClassifier } from './classifiers';
import { ConfigError, loadConfig, type AppConfig } from './config';
import { createDealStarter } from './dealers';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { SentimentScorer } from './SentimentScorer';
import { createServer } from './server';
import { WebhookHandler } from './WebhookHandler';

function readConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      createLogger().fatal({ issues: err.issues }, 'invalid configuration');
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();
const log = createLogger(config.logLevel);

const scorer = new SentimentScorer(createClassifier(config.sentiment));
const dealer = createDealStarter(config, log.child({ component: 'dealer' }));
const handler = new WebhookHandler({ config, scorer, dealer, log: log.child({ component: 'webhook' }) });
const server = createServer({ handler, metrics: createMetrics(), log });

server.listen(config.port, () =>
  log.info({ port: config.port, dryRun: config.dryRun, sentiment: config.sentiment.provider, auth: Boolean(config.webhookToken) }, 'Webhook server listening')
);
