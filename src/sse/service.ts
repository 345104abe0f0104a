/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events client registry and broadcasting.
 */
import type { Publisher } from "../bridge/index.js";
import { createLogger } from "../logger.js";
import type { SseEvent } from "./schema.js";
import {
  encodeSseEvent,
  toDeviceSnapshotEvent,
  toEventLogEvent,
} from "./transform.js";

const log = createLogger("sse");

// =============================================================================
// Client Management
// =============================================================================

type SseClient = {
  id: number;
  controller: ReadableStreamDefaultController<Uint8Array>;
  connected: boolean;
};

let clients: SseClient[] = [];
let nextClientId = 1;
const encoder = new TextEncoder();

/**
 * Get count of connected clients.
 */
export function getClientCount(): number {
  return clients.filter((c) => c.connected).length;
}

/**
 * Create a new SSE stream for a client. The client is registered and
 * receives a `connected` event before this returns.
 */
export function createSseStream(): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;
  let client: SseClient | null = null;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      client = { id: clientId, controller, connected: true };
      clients.push(client);
      log.info(
        { clientId, totalClients: getClientCount() },
        "SSE client connected",
      );

      controller.enqueue(
        encoder.encode(encodeSseEvent({ type: "connected", clientId })),
      );
    },
    cancel() {
      if (client) {
        client.connected = false;
        clients = clients.filter((c) => c.id !== clientId);
        log.info(
          { clientId, remainingClients: getClientCount() },
          "SSE client disconnected",
        );
      }
    },
  });

  return { stream, clientId };
}

/**
 * Remove a client by ID.
 */
export function removeClient(clientId: number): void {
  const client = clients.find((c) => c.id === clientId);
  if (client) {
    client.connected = false;
    clients = clients.filter((c) => c.id !== clientId);
    log.debug({ clientId }, "SSE client removed");
  }
}

// =============================================================================
// Event Broadcasting
// =============================================================================

/**
 * Broadcast an event to all connected clients. Clients whose stream has
 * gone away are dropped.
 */
export function broadcast(event: SseEvent): void {
  const connectedClients = clients.filter((c) => c.connected);

  if (connectedClients.length === 0) {
    log.debug({ eventType: event.type }, "No clients to broadcast to");
    return;
  }

  const data = encoder.encode(encodeSseEvent(event));
  let successCount = 0;
  let errorCount = 0;

  for (const client of connectedClients) {
    try {
      client.controller.enqueue(data);
      successCount++;
    } catch (error) {
      log.debug(
        { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
        "Enqueue failed, dropping client",
      );
      client.connected = false;
      errorCount++;
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
}

/**
 * Send event to a specific client.
 */
export function sendToClient(clientId: number, event: SseEvent): boolean {
  const client = clients.find((c) => c.id === clientId && c.connected);
  if (!client) return false;

  try {
    client.controller.enqueue(encoder.encode(encodeSseEvent(event)));
    return true;
  } catch {
    client.connected = false;
    return false;
  }
}

// =============================================================================
// Publisher
// =============================================================================

/**
 * Bridge publisher that fans coordinator results out to SSE clients.
 */
export function createSsePublisher(attributeBudgetBytes: number): Publisher {
  return {
    name: "sse",
    publishDevice(snapshot) {
      broadcast(toDeviceSnapshotEvent(snapshot, Date.now()));
    },
    publishEventLog(batch) {
      broadcast(toEventLogEvent(batch, attributeBudgetBytes));
    },
    publishError(source, message) {
      broadcast({ type: "poll_error", source, message });
    },
  };
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * Disconnect all clients (for shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: clients.length }, "Disconnecting all SSE clients...");

  for (const client of clients) {
    try {
      client.controller.close();
    } catch {
      // Already closed
    }
  }

  clients = [];
}
