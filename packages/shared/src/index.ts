// Types
export * from './types/json.js';
export * from './types/blueprint.js';
export * from './types/settings.js';
export * from './types/stack.js';
export * from './types/preset.js';

// Constants
export * from './constants/errors.js';
export * from './constants/pipeline.js';

// Schemas
export * from './schemas/blueprint.js';
export * from './schemas/stack.js';
export * from './schemas/preset.js';
