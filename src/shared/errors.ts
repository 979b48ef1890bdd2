/**
 * Raised by the planner when a correspondence breaks one of its invariants
 * (an aligner defect, not bad input). No partial plan accompanies it.
 */
export class PlanStructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlanStructureError';
  }
}
