export { createSubmissionsRouter } from './submissions.controller';
export * from './submissions.schemas';
