import type { PortalAdapter } from '@trawl/parser-sdk';
import { monsterPortal } from '@trawl/parser-monster';
import { stepstonePortal } from '@trawl/parser-stepstone';

export const PORTAL_IDS = ['stepstone', 'monster'] as const;
export type PortalId = (typeof PORTAL_IDS)[number];

const portals: Record<PortalId, PortalAdapter> = {
  stepstone: stepstonePortal,
  monster: monsterPortal,
};

export function getPortal(id: PortalId): PortalAdapter {
  return portals[id];
}
