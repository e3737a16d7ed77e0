export type PlanName = "pro" | "max5" | "max20";

export interface PlanLimit {
  readonly name: string;
  /** Compared against a session block's output tokens only. */
  readonly tokenLimit: number;
  readonly costLimit: number;
  readonly callLimit: number;
}

export const PLAN_LIMITS: Readonly<Record<PlanName, PlanLimit>> = Object.freeze({
  pro: Object.freeze({ name: "pro", tokenLimit: 19_000, costLimit: 18.0, callLimit: 250 }),
  max5: Object.freeze({ name: "max5", tokenLimit: 88_000, costLimit: 35.0, callLimit: 1_000 }),
  max20: Object.freeze({ name: "max20", tokenLimit: 220_000, costLimit: 140.0, callLimit: 2_000 }),
});

export function isPlanName(name: string): name is PlanName {
  return Object.hasOwn(PLAN_LIMITS, name);
}
