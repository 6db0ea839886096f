export interface ConfidenceCheck {
  name: string;
  points: number;
  earned: boolean;
}

export interface ConfidenceResult {
  score: number;
  points: number;
  checks: ConfidenceCheck[];
}
