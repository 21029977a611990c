import { join } from "node:path";
import { type Clock } from "#/application/ports/clock";
import { type Logger } from "#/application/ports/observability";
import { AgentControlLoop } from "#/application/use-cases/agent/agent-control-loop";
import { CommandExecutor } from "#/application/use-cases/commands/command-executor";
import { ConnectivityMonitor } from "#/application/use-cases/connectivity/connectivity-monitor";
import { ContentReconciler } from "#/application/use-cases/content/content-reconciler";
import { HeartbeatClient } from "#/application/use-cases/heartbeat/heartbeat-client";
import {
  IdentityStore,
  type RegistrationDefaults,
} from "#/application/use-cases/identity/identity-store";
import { AccessPointProvisioner } from "#/application/use-cases/provisioning/access-point-provisioner";
import { type ConnectivityPolicy } from "#/domain/connectivity/connectivity";
import {
  accessPointSsid,
  type DeviceId,
} from "#/domain/identity/device-identity";
import { HttpControlServerClient } from "#/infrastructure/http/control-server.client";
import { HttpMediaDownloader } from "#/infrastructure/http/http-media.downloader";
import { DnsNetworkProbe } from "#/infrastructure/network/dns-network.probe";
import { NmcliAccessPoint } from "#/infrastructure/network/nmcli-access-point";
import { NmcliWifiConfigurator } from "#/infrastructure/network/nmcli-wifi.configurator";
import {
  createAgentDocumentStores,
  createDeviceConfigStore,
} from "#/infrastructure/storage/agent-documents";
import { MediaFileStore } from "#/infrastructure/storage/media-file.store";
import { VcgencmdDisplayPower } from "#/infrastructure/system/display-power";
import { LinuxHardware } from "#/infrastructure/system/linux-hardware";
import { runCommand } from "#/infrastructure/system/run-command";
import { CommandScreenCapture } from "#/infrastructure/system/screen-capture";
import { SudoSystemPower } from "#/infrastructure/system/system-power";
import { SystemClock } from "#/infrastructure/time/system.clock";

export interface AgentContainerConfig {
  configDir: string;
  dataDir: string;
  defaults: RegistrationDefaults;
  policy: ConnectivityPolicy;
  probeIntervalMs: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  downloadConcurrency: number;
  wifiInterface: string;
  accessPointPassword: string | null;
  agentVersion: string;
  logger: Logger;
}

/** Use cases the one-shot CLI commands and the long-running agent share. */
export interface AgentContainer {
  clock: Clock;
  identity: IdentityStore;
  monitor: ConnectivityMonitor;
  heartbeat: HeartbeatClient;
  executor: CommandExecutor;
  reconciler: ContentReconciler;
}

export const createAgentContainer = (
  config: AgentContainerConfig,
): AgentContainer => {
  const { logger } = config;
  const clock = new SystemClock();
  const documents = createAgentDocumentStores(config.dataDir);
  const hardware = new LinuxHardware({
    run: runCommand,
    agentVersion: config.agentVersion,
    storagePath: config.dataDir,
  });
  const displayPower = new VcgencmdDisplayPower(runCommand);
  const controlServer = new HttpControlServerClient({
    requestTimeoutMs: config.requestTimeoutMs,
    logger,
  });

  const identity = new IdentityStore({
    configStore: createDeviceConfigStore(config.configDir),
    watermarkStore: documents.watermarkStore,
    fingerprintSource: hardware,
    defaults: config.defaults,
    logger,
  });
  const monitor = new ConnectivityMonitor({
    networkProbe: new DnsNetworkProbe({ timeoutMs: config.requestTimeoutMs }),
    controlServer,
    policy: config.policy,
    logger,
  });
  const heartbeat = new HeartbeatClient({
    controlServer,
    identity,
    systemInfo: hardware,
    displayPower,
    clock,
    logger,
  });
  const executor = new CommandExecutor({
    watermarkStore: documents.watermarkStore,
    displayPower,
    systemPower: new SudoSystemPower(runCommand),
    screenCapture: new CommandScreenCapture(runCommand),
    controlServer,
    clock,
    logger,
  });
  const reconciler = new ContentReconciler({
    mediaStore: new MediaFileStore(join(config.dataDir, "media")),
    downloader: new HttpMediaDownloader({
      downloadTimeoutMs: config.downloadTimeoutMs,
    }),
    assignmentStore: documents.assignmentStore,
    activePlaylistStore: documents.activePlaylistStore,
    clock,
    downloadConcurrency: config.downloadConcurrency,
    logger,
  });

  return {
    clock,
    identity,
    monitor,
    heartbeat,
    executor,
    reconciler,
  };
};

/**
 * The long-running parts. They need the device id, which names the setup
 * access point.
 */
export const createAgentRuntime = (
  container: AgentContainer,
  config: AgentContainerConfig,
  deviceId: DeviceId,
) => {
  const provisioner = new AccessPointProvisioner({
    accessPoint: new NmcliAccessPoint({
      interfaceName: config.wifiInterface,
      run: runCommand,
      logger: config.logger,
    }),
    wifi: new NmcliWifiConfigurator({
      interfaceName: config.wifiInterface,
      run: runCommand,
    }),
    ssid: accessPointSsid(deviceId),
    password: config.accessPointPassword,
    onNetworkConfigured: () => loop.requestImmediateCycle(),
    logger: config.logger,
  });
  const loop: AgentControlLoop = new AgentControlLoop({
    identity: container.identity,
    monitor: container.monitor,
    provisioner,
    heartbeat: container.heartbeat,
    executor: container.executor,
    reconciler: container.reconciler,
    clock: container.clock,
    probeIntervalMs: config.probeIntervalMs,
    logger: config.logger,
  });

  return { provisioner, loop };
};
