export { createRanksRouter } from './ranks.controller';
