import { Difficulty, type DifficultyName } from './messages';

export interface DifficultySettings {
  chaserCount: number;
  chaserSpeed: number; // units per tick
  bulletInterval: number; // game seconds between volleys
  bulletSpeed: number; // units per tick
}

// Fewer chasers on EASY, but each one is faster.
export const DIFFICULTY_SETTINGS: Record<Difficulty, DifficultySettings> = {
  [Difficulty.EASY]: { chaserCount: 1, chaserSpeed: 2.0, bulletInterval: 3.0, bulletSpeed: 3.0 },
  [Difficulty.MEDIUM]: { chaserCount: 2, chaserSpeed: 1.0, bulletInterval: 2.0, bulletSpeed: 5.0 },
  [Difficulty.HARD]: { chaserCount: 3, chaserSpeed: 0.5, bulletInterval: 1.0, bulletSpeed: 7.0 }
};

export function getDifficultySettings(difficulty: Difficulty): DifficultySettings {
  return DIFFICULTY_SETTINGS[difficulty];
}

export function isDifficulty(v: unknown): v is Difficulty {
  return v === Difficulty.EASY || v === Difficulty.MEDIUM || v === Difficulty.HARD;
}

export function difficultyName(difficulty: Difficulty): DifficultyName {
  switch (difficulty) {
    case Difficulty.EASY:
      return 'EASY';
    case Difficulty.MEDIUM:
      return 'MEDIUM';
    case Difficulty.HARD:
      return 'HARD';
  }
}

/** Accepts a name ("hard") or a wire value ("3"). */
export function parseDifficulty(value: unknown, fallback: Difficulty = Difficulty.MEDIUM): Difficulty {
  if (isDifficulty(value)) return value;
  if (typeof value !== 'string') return fallback;
  const trimmed = value.trim().toUpperCase();
  if (trimmed === 'EASY' || trimmed === 'MEDIUM' || trimmed === 'HARD') return Difficulty[trimmed];
  const n = Number(trimmed);
  return trimmed !== '' && isDifficulty(n) ? n : fallback;
}
