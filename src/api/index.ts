export { routeRequest, resolveWindow, statusFor } from './routes';
export type { RouteContext, RouteResponse } from './routes';
export { createRequestHandler, startApiServer, stopApiServer } from './server';
