export * from './weight_override.model.js';
export * from './weight_override.repo.js';
export * from './weights.service.js';
