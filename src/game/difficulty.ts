import type { DifficultyTier } from './types';

export const DIFFICULTY_TIERS: DifficultyTier[] = [
  { bossesDefeated: 0, enemyType: 'SIMPLE', label: 'Easy' },
  { bossesDefeated: 1, enemyType: 'MID', label: 'Medium' },
  { bossesDefeated: 2, enemyType: 'HARD', label: 'Hard' },
];

export function getDifficultyTier(bossesDefeated: number): DifficultyTier {
  let tier = DIFFICULTY_TIERS[0];
  for (const candidate of DIFFICULTY_TIERS) {
    if (bossesDefeated >= candidate.bossesDefeated) {
      tier = candidate;
    }
  }
  return tier;
}
