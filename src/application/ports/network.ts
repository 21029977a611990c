export interface NetworkProbe {
  isLocalNetworkReachable(host: string): Promise<boolean>;
}

export interface WifiCredentials {
  ssid: string;
  password: string;
}

export interface AccessPointControl {
  start(input: { ssid: string; password: string | null }): Promise<void>;
  stop(): Promise<void>;
}

export interface WifiConfigurator {
  /** Persists the credentials to the OS network configuration and connects. */
  apply(credentials: WifiCredentials): Promise<void>;
  scan(): Promise<string[]>;
}
