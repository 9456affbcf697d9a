import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";

const config = loadConfig();
const httpServer = createServer(createApp());

httpServer.on("error", (error) => {
  console.error("Server error", error);
  process.exitCode = 1;
});

httpServer.listen(config.port, config.host, () => {
  console.log(`Server listening on http://${config.host}:${config.port}`);
});
