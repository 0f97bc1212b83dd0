export { default as servicesPlugin } from './services-plugin.js';
export type { ServicesOptions } from './services-plugin.js';
export { default as basicAuthPlugin, parseBasicAuth } from './basic-auth.js';
export type { BasicAuthOptions } from './basic-auth.js';
export { default as queryRoutes } from './query-routes.js';
export { default as graphqlRoutes } from './graphql-routes.js';
export { default as healthRoutes } from './health-routes.js';
