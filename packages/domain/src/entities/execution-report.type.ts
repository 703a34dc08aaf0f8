export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type QueryRow = Record<string, JsonValue>;

export type StepResult = {
  stepNumber: number;
  description: string;
  query: string;
  /** Result rows when the step executed, error text otherwise. */
  resultPayload: QueryRow[] | string;
  executionSucceeded: boolean;
  validationPassed: boolean;
  feedback: string;
};

export type ExecutionReport = {
  objective: string;
  stepsExecuted: StepResult[];
  errors: string[];
  warnings: string[];
  /** Markdown answer composed from the validated steps. */
  finalAnswer: string;
  /** False only when setup (loading the dataset) failed. */
  success: boolean;
};
