/**
 * Binary actuator capability. State is undefined until first commanded.
 */
export interface Output {
  activate(): void;
  deactivate(): void;
  getState(): boolean | undefined;
}

export type WriteCallback = (on: boolean) => void;

export class CallbackOutput implements Output {
  private state: boolean | undefined;

  constructor(private readonly callback: WriteCallback = () => {}) {}

  activate(): void {
    this.state = true;
    this.callback(true);
  }

  deactivate(): void {
    this.state = false;
    this.callback(false);
  }

  getState(): boolean | undefined {
    return this.state;
  }
}
