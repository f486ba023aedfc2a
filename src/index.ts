import "dotenv/config";
import { buildApp } from "./app.js";
import { loadConfig } from "./config/index.js";

async function main() {
  const cfg = loadConfig();
  console.log(
    `Config loaded (port: ${cfg.server.port}, github: ${cfg.github.api_url}, batch interval: ${cfg.batch.min_interval_ms}ms)`,
  );
  if (!cfg.github.client_id || !cfg.github.client_secret) {
    console.warn("WARN: GITHUB_CLIENT_ID / GITHUB_CLIENT_SECRET not set; OAuth login is disabled");
  }

  const app = buildApp(cfg);

  const port = cfg.server.port;
  app.listen(port, () => {
    console.log(`Starting server on :${port}`);
  });
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
