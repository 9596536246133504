export * from './http/createQueryApp.js';
export * from './http/errors.js';
export * from './middleware/actor.js';
export * from './middleware/responseEnvelope.js';
export * from './routers/search.js';
