import { createServer } from "http";
import { createApp } from "./app";
import { EXTRACTOR_CONFIG } from "./config/extractorConfig";

const server = createServer(createApp());

const cleanup = () => {
  console.log("Server shutting down...");
  server.close(() => {
    console.log("Server closed");
    process.exit(0);
  });
};

process.on("SIGTERM", cleanup);
process.on("SIGINT", cleanup);

server.listen(EXTRACTOR_CONFIG.port, () => {
  console.log(`Server running on port ${EXTRACTOR_CONFIG.port}`);
});

export default server;
