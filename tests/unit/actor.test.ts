import { createActor } from '../../src/domain/actor';
import { Role, TransitionKind } from '../../src/domain/types';

const actorWith = (role: Role) => createActor({ id: `actor-${role}`, name: role, role });

describe('role capabilities', () => {
  test.each<[Role, TransitionKind[]]>([
    ['OPERATOR', ['START', 'APPROVE', 'REJECT', 'RELEASE', 'ALLOCATE']],
    ['QUALITY', ['START', 'APPROVE', 'REJECT', 'RELEASE', 'ALLOCATE', 'VIEW_STATISTICS']],
    ['SUPERVISOR', ['START', 'APPROVE', 'REJECT', 'RELEASE', 'REASSIGN', 'ALLOCATE', 'VIEW_STATISTICS']],
    ['REPAIRER', ['REPAIR']],
  ])('%s may only %j', (role, allowed) => {
    const all: TransitionKind[] = [
      'START',
      'APPROVE',
      'REJECT',
      'RELEASE',
      'REASSIGN',
      'ALLOCATE',
      'REPAIR',
      'VIEW_STATISTICS',
      'MANAGE_CATALOG',
      'MANAGE_ACTORS',
    ];
    const actor = actorWith(role);
    expect(all.filter((kind) => actor.canTransition(kind))).toEqual(allowed);
  });

  test('ADMIN may do everything', () => {
    const admin = actorWith('ADMIN');
    expect(admin.canTransition('MANAGE_CATALOG')).toBe(true);
    expect(admin.canTransition('MANAGE_ACTORS')).toBe(true);
    expect(admin.canTransition('REPAIR')).toBe(true);
    expect(admin.canTransition('REASSIGN')).toBe(true);
  });
});
