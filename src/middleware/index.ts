export { errorMiddleware } from './error.middleware.js';
