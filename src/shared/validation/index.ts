export * from './ValidationSchema.js';
export * from './ValidationError.js';
export * from './RequestValidator.js';
export * from './schemas/ActivitySchemas.js';
