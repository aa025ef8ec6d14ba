import { isRoleId, type RoleId } from '@pentad/core';
import type { CommunicationConfig } from '../config/schemas.js';

/**
 * Title overrides from the `agents` section of config.yml
 */
export function titleOverrides(config: CommunicationConfig): Partial<Record<RoleId, string>> {
  const titles: Partial<Record<RoleId, string>> = {};
  for (const [role, settings] of Object.entries(config.agents)) {
    if (isRoleId(role) && settings?.title !== undefined) {
      titles[role] = settings.title;
    }
  }
  return titles;
}
