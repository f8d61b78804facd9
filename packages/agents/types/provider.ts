// Generation provider contract. Both calls reject on failure or timeout.

export interface GenerationProvider {
  readonly model: string;
  complete(instructions: string, content: string): Promise<string>;
  /** Rejects with MalformedOutputError when no JSON object can be recovered */
  completeStructured(instructions: string, content: string): Promise<unknown>;
}
