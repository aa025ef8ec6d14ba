import type { ILogger } from '../shared/logging/ILogger.js';
import type { RoleId } from '../roles/types.js';
import type { IRoleRouter } from './IRoleRouter.js';
import { NoOpRoleRouter } from './NoOpRoleRouter.js';
import { RoleRouter } from './RoleRouter.js';
import type { IMessageBus } from './types.js';

/**
 * Pick the router variant once, from the bus state at startup
 */
export function createRoleRouter(role: RoleId, bus: IMessageBus, logger: ILogger): IRoleRouter {
  return bus.isConnected() ? new RoleRouter(role, bus, logger) : new NoOpRoleRouter(role, logger);
}
