/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events broadcasting of status readings and connection state.
 */
import { createLogger } from "../logger.js";
import type { SseBroadcaster, SseEvent } from "./schema.js";

const log = createLogger("sse");

/**
 * SSE client connection.
 */
type SseClient = {
  id: number;
  controller: ReadableStreamDefaultController<Uint8Array>;
  connected: boolean;
};

/**
 * Frame an event on the wire: `event: <type>\ndata: <json>\n\n`.
 */
export function formatSseEvent(event: SseEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

/**
 * Create an SSE broadcaster with its own client registry.
 */
export function createSseBroadcaster(): SseBroadcaster {
  const encoder = new TextEncoder();
  let clients: SseClient[] = [];
  let nextClientId = 1;

  const getClientCount = (): number => clients.filter((c) => c.connected).length;

  const createSseStream: SseBroadcaster["createSseStream"] = () => {
    const clientId = nextClientId++;
    let client: SseClient | null = null;

    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        client = { id: clientId, controller, connected: true };
        clients.push(client);
        log.info({ clientId, totalClients: getClientCount() }, "SSE client connected");

        controller.enqueue(
          encoder.encode(`event: connected\ndata: ${JSON.stringify({ clientId })}\n\n`),
        );
      },
      cancel() {
        if (client) {
          client.connected = false;
          clients = clients.filter((c) => c.id !== clientId);
          log.info({ clientId, remainingClients: getClientCount() }, "SSE client disconnected");
        }
      },
    });

    return { stream, clientId };
  };

  const removeClient = (clientId: number): void => {
    const client = clients.find((c) => c.id === clientId);
    if (client) {
      client.connected = false;
      clients = clients.filter((c) => c.id !== clientId);
      log.debug({ clientId }, "SSE client removed");
    }
  };

  const broadcast = (event: SseEvent): void => {
    const connectedClients = clients.filter((c) => c.connected);

    if (connectedClients.length === 0) {
      log.debug({ eventType: event.type }, "No clients to broadcast to");
      return;
    }

    const data = encoder.encode(formatSseEvent(event));
    let successCount = 0;
    let errorCount = 0;

    for (const client of connectedClients) {
      try {
        client.controller.enqueue(data);
        successCount++;
      } catch (error) {
        client.connected = false;
        errorCount++;
        log.debug(
          { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
          "SSE enqueue failed",
        );
      }
    }

    if (errorCount > 0) {
      clients = clients.filter((c) => c.connected);
      log.debug(
        { eventType: event.type, sent: successCount, failed: errorCount },
        "Broadcast complete with disconnections",
      );
    }

    log.debug({ eventType: event.type, clients: successCount }, "Event broadcasted");
  };

  const sendToClient = (clientId: number, event: SseEvent): boolean => {
    const client = clients.find((c) => c.id === clientId && c.connected);
    if (!client) return false;

    try {
      client.controller.enqueue(encoder.encode(formatSseEvent(event)));
      return true;
    } catch (error) {
      client.connected = false;
      log.debug(
        { clientId, error: error instanceof Error ? error.message : String(error) },
        "SSE enqueue failed",
      );
      return false;
    }
  };

  const disconnectAllClients = (): void => {
    log.info({ clientCount: clients.length }, "Disconnecting all SSE clients...");

    for (const client of clients) {
      try {
        client.controller.close();
      } catch (error) {
        // Stream already cancelled by the client
        log.debug(
          { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
          "SSE stream already closed",
        );
      }
    }

    clients = [];
  };

  return {
    createSseStream,
    removeClient,
    getClientCount,
    broadcast,
    broadcastStatus: (status) => broadcast({ type: "status", status }),
    broadcastConnectionState: (state, previous) =>
      broadcast({ type: "connection_state", state, previous }),
    sendToClient,
    disconnectAllClients,
  };
}
