import { escapeHtml } from "#/interfaces/http/views/html";

export const renderWifiPage = (input: {
  deviceId: string;
  accessPointSsid: string;
  networks: readonly string[];
}): string => {
  const options = input.networks
    .map((ssid) => `<option value="${escapeHtml(ssid)}"></option>`)
    .join("");

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Player network setup</title>
<style>
body{font-family:system-ui,sans-serif;max-width:28rem;margin:2rem auto;padding:0 1rem}
label{display:block;margin-top:1rem}input{width:100%;padding:.5rem;box-sizing:border-box}
button{margin-top:1.5rem;padding:.6rem 1.2rem}#result{margin-top:1rem}
</style>
</head>
<body>
<h1>Network setup</h1>
<p>Device <strong>${escapeHtml(input.deviceId)}</strong>, setup network <strong>${escapeHtml(input.accessPointSsid)}</strong></p>
<form id="wifi">
<label>Network name<input name="ssid" list="networks" maxlength="32" required></label>
<datalist id="networks">${options}</datalist>
<label>Password<input name="password" type="password" maxlength="63"></label>
<button type="submit">Connect</button>
</form>
<p id="result" role="status"></p>
<script>
document.getElementById("wifi").addEventListener("submit", async (event) => {
  event.preventDefault();
  const form = new FormData(event.target);
  const result = document.getElementById("result");
  const response = await fetch("/wifi/connect", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ ssid: form.get("ssid"), password: form.get("password") || "" }),
  });
  const body = await response.json();
  result.textContent = response.ok ? body.data.message : body.error.message;
});
</script>
</body>
</html>
`;
};
