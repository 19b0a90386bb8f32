import { RuleStoreRef, isSourceLoadError } from '@ignis/core';
import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { logRuleSet } from './rule-log.js';

async function main() {
  const config = loadConfig();

  // A rule set that fails to load stops start-up; there is no empty fallback.
  const rules = RuleStoreRef.fromPath(config.rulesPath);

  const server = createServer({ rules, logLevel: config.logLevel });
  logRuleSet(server.log, rules.current(), 'loaded');

  await server.listen({ port: config.port, host: config.host });

  process.on('SIGHUP', () => {
    try {
      logRuleSet(server.log, rules.reload(), 'reloaded');
    } catch (error) {
      if (!isSourceLoadError(error)) throw error;
      server.log.error({ err: error }, 'rule reload failed, keeping the previous rule set');
    }
  });

  // Graceful shutdown
  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      server.log.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
