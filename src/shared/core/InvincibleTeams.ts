import { normalizeTeam } from './Body';
import { TeamNames } from './types';

/**
 * Set of team names whose members take no hit point loss.
 *
 * Names are trimmed and lowercased on the way in and on lookup; empty names
 * are dropped.
 */
export class InvincibleTeams {
  private teams: Set<string> = new Set();

  constructor(teams: TeamNames = []) {
    this.set(teams);
  }

  /** Replace the whole set */
  set(teams: TeamNames): void {
    const normalized = new Set<string>();
    for (const team of teams) {
      const name = normalizeTeam(team);
      if (name !== '') {
        normalized.add(name);
      }
    }
    this.teams = normalized;
  }

  has(team: string): boolean {
    return this.teams.has(normalizeTeam(team));
  }

  list(): string[] {
    return Array.from(this.teams).sort();
  }
}
