import { describe, it, expect } from 'vitest';
import { selectTeamMapping } from '../teamMappingSelector';
import type { TeamMapping } from '../tickets';

function makeMapping(overrides: Partial<TeamMapping> = {}): TeamMapping {
  return {
    id: 1,
    department: 'IT',
    teamName: 'IT Support Team',
    apiEndpoint: 'https://acme.atlassian.net/rest/api/2/issue',
    apiMethod: 'POST',
    apiHeaders: {},
    priorityThreshold: 'low',
    isActive: true,
    ...overrides,
  };
}

describe('teamMappingSelector', () => {
  const low = makeMapping({ id: 1, priorityThreshold: 'low' });
  const high = makeMapping({ id: 2, priorityThreshold: 'high' });
  const critical = makeMapping({ id: 3, priorityThreshold: 'critical' });

  it('no mappings → null', () => {
    expect(selectTeamMapping([], 'medium')).toBeNull();
  });

  it('only inactive mappings → null', () => {
    expect(selectTeamMapping([makeMapping({ isActive: false })], 'critical')).toBeNull();
  });

  it('picks the highest threshold the priority meets', () => {
    expect(selectTeamMapping([low, high, critical], 'high')?.id).toBe(2);
    expect(selectTeamMapping([low, high, critical], 'critical')?.id).toBe(3);
    expect(selectTeamMapping([critical, low, high], 'medium')?.id).toBe(1);
  });

  it('falls back to the highest-threshold mapping when none is met', () => {
    expect(selectTeamMapping([high, critical], 'low')?.id).toBe(3);
  });

  it('ignores inactive mappings when selecting', () => {
    const inactiveHigh = makeMapping({ id: 4, priorityThreshold: 'high', isActive: false });
    expect(selectTeamMapping([low, inactiveHigh], 'high')?.id).toBe(1);
  });

  it('does not reorder the caller array', () => {
    const input = [low, critical];
    selectTeamMapping(input, 'low');
    expect(input.map((m) => m.id)).toEqual([1, 3]);
  });
});
