import { createServer, type IncomingMessage, type ServerResponse } from "node:http";

import {
  buildMockChatMessages,
  decodeCursor,
  encodeCursor,
  formatRetryLine,
  formatStreamFrame,
  paginateChatMessages
} from "./mockData";

const port = Number.parseInt(process.env.PORT ?? "3100", 10);
const totalMessages = Number.parseInt(process.env.MOCK_TOTAL_MESSAGES ?? "500", 10);
const pollingIntervalMillis = Number.parseInt(process.env.MOCK_POLLING_INTERVAL_MS ?? "2000", 10);
const liveChatId = process.env.MOCK_LIVE_CHAT_ID ?? "mock-live-chat";
const endWhenExhausted = process.env.MOCK_END_AFTER_EXHAUSTED === "true";

const API_PREFIX = "/youtube/v3/";
const messages = buildMockChatMessages(totalMessages, liveChatId);
let createdResources = 0;
const moderators = new Map<string, string>();

function writeJson(response: ServerResponse, statusCode: number, payload: unknown): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
}

function writeApiError(response: ServerResponse, statusCode: number, reason: string, message: string): void {
  writeJson(response, statusCode, {
    error: { code: statusCode, message, errors: [{ reason, message }] }
  });
}

async function readJsonBody(request: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  const text = Buffer.concat(chunks).toString("utf8");
  return text.length > 0 ? JSON.parse(text) : {};
}

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

/** Channel id from a `liveChatModerators.insert` body. */
function moderatorChannelId(body: unknown): string {
  const channelId = field(field(field(field(body, "snippet"), "moderatorDetails"), "channelDetails"), "channelId");
  return typeof channelId === "string" ? channelId : "";
}

function pageFor(url: URL, cursor: string | null) {
  const limit = Number.parseInt(url.searchParams.get("maxResults") ?? "500", 10);
  return paginateChatMessages(messages, {
    limit,
    cursor,
    pollingIntervalMillis,
    endWhenExhausted
  });
}

function streamMessages(url: URL, request: IncomingMessage, response: ServerResponse): void {
  let cursor = url.searchParams.get("pageToken");
  // Reject a bad token before the event-stream headers go out.
  if (cursor) {
    decodeCursor(cursor);
  }

  response.statusCode = 200;
  response.setHeader("Content-Type", "text/event-stream");
  response.setHeader("Cache-Control", "no-cache");
  response.write(formatRetryLine(pollingIntervalMillis));

  const pushPage = (): void => {
    const page = pageFor(url, cursor);
    cursor = page.nextPageToken;
    response.write(formatStreamFrame(page));

    if (page.offlineAt) {
      clearInterval(timer);
      response.end();
    }
  };

  const timer = setInterval(pushPage, pollingIntervalMillis);
  request.on("close", () => clearInterval(timer));
  pushPage();
}

async function handleModeration(
  resource: "messages" | "bans" | "moderators",
  request: IncomingMessage,
  response: ServerResponse
): Promise<void> {
  if (resource === "moderators" && request.method === "GET") {
    writeJson(response, 200, {
      kind: "youtube#liveChatModeratorListResponse",
      items: Array.from(moderators, ([id, channelId]) => ({
        id,
        snippet: { liveChatId, moderatorDetails: { channelId, displayName: channelId } }
      }))
    });
    return;
  }

  if (request.method === "DELETE") {
    const id = new URL(request.url ?? "/", "http://localhost").searchParams.get("id");
    if (resource === "moderators" && id) {
      moderators.delete(id);
    }
    response.statusCode = 204;
    response.end();
    return;
  }

  if (request.method !== "POST") {
    writeApiError(response, 405, "methodNotAllowed", `${request.method ?? "?"} not supported`);
    return;
  }

  const body = await readJsonBody(request);
  createdResources += 1;
  const id = `${resource}-${encodeCursor(createdResources)}`;
  const fields = typeof body === "object" && body !== null ? body : {};
  if (resource === "moderators") {
    moderators.set(id, moderatorChannelId(body));
  }
  writeJson(response, 200, { id, ...fields });
}

async function route(request: IncomingMessage, response: ServerResponse): Promise<void> {
  if (!request.url) {
    writeApiError(response, 400, "badRequest", "Missing URL");
    return;
  }

  const url = new URL(request.url, `http://localhost:${port}`);

  if (url.pathname === "/health") {
    writeJson(response, 200, { status: "ok" });
    return;
  }

  if (!url.pathname.startsWith(API_PREFIX)) {
    writeApiError(response, 404, "notFound", "Not Found");
    return;
  }

  const path = url.pathname.slice(API_PREFIX.length);

  if (path === "liveChat/messages" && request.method === "GET") {
    writeJson(response, 200, pageFor(url, url.searchParams.get("pageToken")));
    return;
  }

  if (path === "liveChat/messages/stream" && request.method === "GET") {
    streamMessages(url, request, response);
    return;
  }

  if (path === "liveChat/messages" || path === "liveChat/bans" || path === "liveChat/moderators") {
    const resource = path === "liveChat/messages" ? "messages" : path === "liveChat/bans" ? "bans" : "moderators";
    await handleModeration(resource, request, response);
    return;
  }

  writeApiError(response, 404, "notFound", "Not Found");
}

const server = createServer((request, response) => {
  route(request, response).catch((error: unknown) => {
    writeApiError(
      response,
      400,
      "invalidPageToken",
      error instanceof Error ? error.message : "Invalid request"
    );
  });
});

server.listen(port, "0.0.0.0", () => {
  console.log(
    `mock live chat api listening (port=${port}, messages=${messages.length}, liveChatId=${liveChatId}, endWhenExhausted=${endWhenExhausted})`
  );
});
