import type { AppSettings } from "./config";
import { handleRequest, type HttpReply } from "./handlers";
import { TflProvider } from "./providers/tfl";
import type { TransitProvider } from "./providers/types";
import { StopResolver } from "./resolver";

export interface App {
  handle(method: string, path: string, host?: string): Promise<HttpReply>;
}

export function createApp(settings: Readonly<AppSettings>, provider: TransitProvider = new TflProvider(settings.tfl)): App {
  const resolver = new StopResolver(provider);

  return {
    async handle(method, path, host = "localhost") {
      let url: URL;
      try {
        url = new URL(path, `http://${host}`);
      } catch {
        return { status: 400, headers: { "Content-Type": "text/plain" }, body: "Invalid request URL" };
      }

      try {
        return await handleRequest(method, url, { settings, provider, resolver });
      } catch (error) {
        console.error("Failed to handle request", error);
        return { status: 500, headers: { "Content-Type": "text/plain" }, body: "Failed to process request" };
      }
    }
  };
}
