export { default as bridgeRoutes } from './bridge-routes.js';
