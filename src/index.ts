#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { envSnapshot, readEnv } from "./config/env.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { PolicyEngine } from "./policy/policy.js";
import { ConsoleEventSink } from "./runs/events.js";

async function main(): Promise<void> {
  const env = readEnv();
  const policy = await PolicyEngine.loadFromFile(env.policyPath);
  const events = new ConsoleEventSink({ component: "gateway" });

  const server = createGatewayServer({ policy, env, events });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  events.event("gateway.ready", "paramsweep gateway ready", { policy_hash: policy.policyHash, env: envSnapshot(env) });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
