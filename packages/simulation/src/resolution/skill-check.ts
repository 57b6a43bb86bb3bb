export interface SkillCheckRequest {
  targetNumber: number;
  /** Trained checks add skill level and the linked attribute; untrained ones add the attribute score alone. */
  trained: boolean;
  skillLevel: number;
  attribute: number;
  difficulty: number;
}

export interface SkillCheckResult {
  roll: number;
  total: number;
  targetNumber: number;
  success: boolean;
  margin: number;
  fumble: boolean;
  stunningSuccess: boolean;
}

/** The campaign's skill-check rules, supplied by the host. */
export interface SkillCheck {
  resolve(request: SkillCheckRequest): SkillCheckResult;
}

const EXPLODE_CAP = 30;

/**
 * 2d6 check: a natural 2 fails outright, a natural 12 keeps rolling d6
 * while sixes come up (total capped at 30).
 */
export class DiceSkillCheck implements SkillCheck {
  constructor(private readonly rollDie: () => number = () => 1 + Math.floor(Math.random() * 6)) {}

  resolve(request: SkillCheckRequest): SkillCheckResult {
    const natural = this.rollDie() + this.rollDie();

    if (natural === 2) {
      return {
        roll: natural,
        total: natural,
        targetNumber: request.targetNumber,
        success: false,
        margin: natural - request.targetNumber,
        fumble: true,
        stunningSuccess: false,
      };
    }

    let roll = natural;
    const stunning = natural === 12;
    while (stunning && roll < EXPLODE_CAP) {
      const die = this.rollDie();
      roll = Math.min(EXPLODE_CAP, roll + die);
      if (die < 6) break;
    }

    const total =
      roll + (request.trained ? request.skillLevel + request.attribute : request.attribute) + request.difficulty;
    return {
      roll,
      total,
      targetNumber: request.targetNumber,
      success: total >= request.targetNumber,
      margin: total - request.targetNumber,
      fumble: false,
      stunningSuccess: stunning,
    };
  }
}

/** Returns the given die faces in order, then repeats the last one. Handy for scripted checks. */
export function scriptedDice(faces: readonly number[]): () => number {
  let i = 0;
  return () => {
    const face = faces[Math.min(i, faces.length - 1)];
    i++;
    return face;
  };
}
