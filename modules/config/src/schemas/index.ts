// JSON Schema exports

export { harvestConfigSchema, type HarvestConfigSchema } from './harvest.schema.js';
