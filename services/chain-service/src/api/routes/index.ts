export { createChainRoutes, queryString } from './chain.routes';
export { createActuatorRoutes } from './actuator.routes';
