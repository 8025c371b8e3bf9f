export { default as errorHandler, statusForCampusError } from './error-handler.js';
export { default as eventRoutes } from './event-routes.js';
export { default as studentRoutes } from './student-routes.js';
export { default as requestRoutes } from './request-routes.js';
export { default as systemRoutes } from './system-routes.js';
