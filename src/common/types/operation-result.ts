/** Outcome handed to presentation adapters instead of an exception. */
export interface OperationResult {
  success: boolean;
  message: string;
}
