/**
 * Observation module
 */

export { ObservationService } from './observation.service.js';
export { MongoObservationRepo } from './observation.repo.js';
export type { ObservationStore } from './observation.repo.js';
export { registerObservationRoutes } from './observation.routes.js';
