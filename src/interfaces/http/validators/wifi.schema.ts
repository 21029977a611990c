import { z } from "zod";

/** Shape only; SSID and passphrase rules live with the provisioner. */
export const wifiConnectSchema = z.object({
  ssid: z.string(),
  password: z.string().default(""),
});
