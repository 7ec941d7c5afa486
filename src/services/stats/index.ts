export {
  statsService,
  StatsService,
  AccountStats,
  PlatformSummary,
  AccountReconciliation,
} from './stats.service';
export { statsController, StatsController } from './stats.controller';
export { default as statsRoutes } from './stats.routes';
