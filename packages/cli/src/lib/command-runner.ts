/**
 * Shared plumbing for commands that talk to the daemon: build a client from
 * config, run the command body, and report failures on stderr with exit
 * code 1.
 */

import { DaemonClient } from "./api-client.js";
import { formatError } from "./formatters.js";

export type ClientFactory = () => DaemonClient;

let clientFactory: ClientFactory = () => DaemonClient.fromConfig();

/** Replace how commands obtain a client (tests only). Pass undefined to reset. */
export function overrideClientFactory(factory: ClientFactory | undefined): void {
  clientFactory = factory ?? (() => DaemonClient.fromConfig());
}

export async function withClient(body: (client: DaemonClient) => Promise<void>): Promise<void> {
  try {
    await body(clientFactory());
  } catch (err) {
    process.stderr.write(formatError(err) + "\n");
    process.exitCode = 1;
  }
}
