import { loadConfig, loadEnvFiles } from "./config";
import { startHttpServer } from "./http";

loadEnvFiles();

startHttpServer(loadConfig()).catch((error: unknown) => {
  console.error("[main] failed to start:", error);
  process.exit(1);
});
