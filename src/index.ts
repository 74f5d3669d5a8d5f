import { createApp } from "./app";
import { env } from "./config/env";
import { createOrchestrator } from "./services/analysisService";

const app = createApp({ orchestrator: createOrchestrator(env), env });

const server = app.listen(env.port, () => {
  console.log(`site-risk-engine listening on http://localhost:${env.port}`);
});

function shutdown(signal: string) {
  console.log(`Received ${signal}. Shutting down gracefully...`);
  server.close(() => {
    process.exit(0);
  });
}

process.on("SIGINT", () => {
  shutdown("SIGINT");
});

process.on("SIGTERM", () => {
  shutdown("SIGTERM");
});
