// Schedulable intents
export type Action = 'read' | 'on' | 'off';

// Controller kinds (closed set)
export type ControllerKind = 'threshold' | 'bidirectional' | 'timed';

// Wire form of a Message (sinks, WebSocket, REST)
export interface SerializedMessage {
  name: string;
  content: string;
  timestamp: string;
  read_state: string | null;
}

// WebSocket frames
export interface ControllerMessageFrame {
  type: 'controller_message';
  message: SerializedMessage;
}

export interface SensorUpdate {
  type: 'sensor_update';
  topic: string;
  value: string;
  timestamp: string;
}

export type SocketFrame = ControllerMessageFrame | SensorUpdate;

// Time of day (UTC), e.g. 05:00:00
export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
}

// Input/Output bindings of a controller entry
export type InputBinding = { type: 'mqtt'; topic: string } | { type: 'static'; value: string };

export type OutputBinding =
  | { type: 'mqtt'; device: string }
  | { type: 'kasa'; device: string }
  | { type: 'none' };

// Validated controller entries (see config/controllers.ts for the file format)
export interface ThresholdControllerConfig {
  kind: 'threshold';
  name: string;
  threshold: number;
  inverted: boolean;
  intervalMs: number;
  input: InputBinding;
  output: OutputBinding;
}

export interface BidirectionalControllerConfig {
  kind: 'bidirectional';
  name: string;
  threshold: number;
  tolerance: number;
  intervalMs: number;
  input: InputBinding;
  increaseOutput: OutputBinding;
  decreaseOutput: OutputBinding;
}

export interface TimedControllerConfig {
  kind: 'timed';
  name: string;
  startTime: TimeOfDay;
  durationMs: number;
  output: OutputBinding;
}

export type ControllerConfig =
  | ThresholdControllerConfig
  | BidirectionalControllerConfig
  | TimedControllerConfig;

// Controller status (REST)
export interface EventSummary {
  action: Action;
  timestamp: string;
  value: string | null;
}

export interface ControllerStatus {
  name: string;
  kind: ControllerKind;
  started: boolean;
  outputs: Record<string, boolean | null>;
  pending: EventSummary[];
}

// Control requests
export interface SetThresholdRequest {
  threshold: number;
}

export interface HealthStatus {
  status: 'ok';
  running: boolean;
  controllers: number;
  websocket_clients: number;
  kasa_devices: number;
  timestamp: string;
}

// API responses
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
