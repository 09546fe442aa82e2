/**
 * Sensor capability: a synchronous read that remembers its last sample
 */
export interface Input {
  read(): string;
  getState(): string | undefined;
}

export type ReadCallback = () => string;

export class CallbackInput implements Input {
  private state: string | undefined;

  constructor(private readonly callback: ReadCallback) {}

  read(): string {
    const value = this.callback();
    this.state = value;
    return value;
  }

  getState(): string | undefined {
    return this.state;
  }
}

/**
 * Input that always reads the same value
 */
export function staticInput(value: string): CallbackInput {
  return new CallbackInput(() => value);
}
