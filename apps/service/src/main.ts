import { createCli } from './cli/index.js';
import { createServices } from './setup.js';

const services = createServices();
const cli = createCli({ pipeline: services.pipeline, store: services.store });

cli.parseAsync(process.argv).catch((error: unknown) => {
  services.logger.error('Command failed', { reason: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
