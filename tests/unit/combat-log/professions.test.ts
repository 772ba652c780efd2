import { describe, it, expect } from 'vitest';
import {
  describePlayerBuild,
  getEliteSpec,
  getProfessionName,
  parseEliteSpec,
  parseProfession,
} from '../../../src/combat-log/constants/Professions';

describe('Professions', () => {
  it('names professions by id', () => {
    expect(getProfessionName(1)).toBe('Guardian');
    expect(getProfessionName(9)).toBe('Revenant');
    expect(getProfessionName(0)).toBeNull();
  });

  it('links elite specializations to their profession', () => {
    expect(getEliteSpec(62)).toEqual({ id: 62, name: 'Firebrand', profession: 1 });
    expect(getEliteSpec(0)).toBeNull();
  });

  it('describes a player build by its most specific name', () => {
    expect(describePlayerBuild(1, 62)).toBe('Firebrand');
    expect(describePlayerBuild(1, 0)).toBe('Guardian');
    expect(describePlayerBuild(1, 999)).toBe('Guardian (spec 999)');
    expect(describePlayerBuild(42, 0)).toBe('Profession 42 (spec 0)');
  });

  it('parses names case-insensitively', () => {
    expect(parseProfession(' warrior ')).toBe(2);
    expect(parseProfession('Bard')).toBeNull();
    expect(parseEliteSpec('DRAGONHUNTER')).toEqual({ id: 27, name: 'Dragonhunter', profession: 1 });
    expect(parseEliteSpec('Bard')).toBeNull();
  });
});
