export type DisplayPowerState = "on" | "off" | "unknown";

export interface DisplayPowerControl {
  getState(): Promise<DisplayPowerState>;
  setState(state: "on" | "off"): Promise<void>;
}

export interface SystemPowerControl {
  reboot(): Promise<void>;
}

export interface ScreenCapture {
  capture(): Promise<Uint8Array>;
}
