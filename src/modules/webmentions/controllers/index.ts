export { WebmentionController } from './webmention.controller';
export { HealthController } from './health.controller';
