import { Actor, Identifier, Role, TransitionKind } from './types';

const FLOOR_WORK: TransitionKind[] = ['START', 'APPROVE', 'REJECT', 'RELEASE', 'ALLOCATE'];

const ROLE_CAPABILITIES: Record<Role, ReadonlySet<TransitionKind>> = {
  OPERATOR: new Set(FLOOR_WORK),
  QUALITY: new Set<TransitionKind>([...FLOOR_WORK, 'VIEW_STATISTICS']),
  SUPERVISOR: new Set<TransitionKind>([...FLOOR_WORK, 'REASSIGN', 'VIEW_STATISTICS']),
  ADMIN: new Set<TransitionKind>([
    ...FLOOR_WORK,
    'REASSIGN',
    'REPAIR',
    'VIEW_STATISTICS',
    'MANAGE_CATALOG',
    'MANAGE_ACTORS',
  ]),
  REPAIRER: new Set<TransitionKind>(['REPAIR']),
};

export function capabilitiesFor(role: Role): ReadonlySet<TransitionKind> {
  return ROLE_CAPABILITIES[role];
}

export function createActor(params: { id: Identifier; name: string; role: Role }): Actor {
  const capabilities = capabilitiesFor(params.role);
  return {
    id: params.id,
    name: params.name,
    role: params.role,
    canTransition: (kind) => capabilities.has(kind),
  };
}
