#!/usr/bin/env node

import { Command } from "commander";
import { registerListenCommand } from "./commands/listen.js";
import { registerConnectCommand } from "./commands/connect.js";
import { registerSendCommand } from "./commands/send.js";
import { registerHttpCommand } from "./commands/http.js";
import { registerPollCommand } from "./commands/poll.js";

const program = new Command();

program
  .name("tlv-relay")
  .description("TLV command/control transport over TCP or HTTP polling")
  .version("1.0.0");

registerListenCommand(program);
registerConnectCommand(program);
registerSendCommand(program);
registerHttpCommand(program);
registerPollCommand(program);

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
