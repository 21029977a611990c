import { type AgentStatus } from "#/application/use-cases/agent/agent-state";
import { type RegistrationView } from "#/interfaces/registration-view";
import { escapeHtml } from "#/interfaces/http/views/html";

const SCREEN_REFRESH_SECONDS = 10;

const row = (label: string, value: string): string =>
  `<dt>${label}</dt><dd>${escapeHtml(value)}</dd>`;

const renderRegistration = (registration: RegistrationView): string =>
  `<h1>Register this player</h1>
<p class="device-id">${escapeHtml(registration.deviceId)}</p>
<p>Add this device ID as a player on <strong>${escapeHtml(registration.serverUrl)}</strong>. The screen changes once the server knows it.</p>`;

const renderStatus = (
  playerId: string,
  registration: RegistrationView,
  status: AgentStatus,
): string => {
  const connection =
    status.serverSignal === "degraded" ? `${status.mode} (degraded)` : status.mode;
  const rows = [
    row("Device", registration.deviceId),
    row("Server", registration.serverUrl),
    row("Connection", connection),
    row("Last contact", status.heartbeat.lastSeenOnlineAt ?? "never"),
    row("Playlist", status.activePlaylistVersion ?? "none"),
  ];
  if (status.lastError) {
    rows.push(row("Last error", status.lastError));
  }
  return `<h1>Player ${escapeHtml(playerId)}</h1>
<dl>${rows.join("")}</dl>`;
};

/** Operator screen: the registration prompt until a player id exists, then the player status. */
export const renderPlayerScreen = (input: {
  registration: RegistrationView;
  status: AgentStatus;
}): string => {
  const { registration, status } = input;
  const body =
    registration.playerId === null
      ? renderRegistration(registration)
      : renderStatus(registration.playerId, registration, status);

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta http-equiv="refresh" content="${SCREEN_REFRESH_SECONDS}">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Signage player</title>
<style>
body{font-family:system-ui,sans-serif;max-width:40rem;margin:3rem auto;padding:0 1rem}
.device-id{font-size:2.5rem;font-weight:700;letter-spacing:.1em}
dl{display:grid;grid-template-columns:auto 1fr;gap:.4rem 1.5rem}dt{font-weight:600}dd{margin:0}
</style>
</head>
<body>
${body}
</body>
</html>
`;
};
