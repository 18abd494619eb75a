import "dotenv/config";
import { createServer } from "node:http";
import { loadSettings } from "./config";
import { createApp } from "./index";

const settings = loadSettings(process.env);
const app = createApp(settings);

const server = createServer((req, res) => {
  app
    .handle(req.method ?? "GET", req.url ?? "/", req.headers.host)
    .then((reply) => {
      res.writeHead(reply.status, reply.headers);
      res.end(reply.body);
    })
    .catch((error: unknown) => {
      console.error("[server] failed to write response", error);
      res.writeHead(500, { "Content-Type": "text/plain" });
      res.end("Internal error");
    });
});

server.listen(settings.port, () => {
  console.info(`[server] listening on :${settings.port}`);
});
