import { createServer, type Server, type Socket } from "node:net";

import { logError, logWarn } from "../logging/index.js";
import { recordSessionRejected } from "../observability/metrics.js";
import type { ServiceContext } from "./context.js";
import { BUSY_MESSAGE } from "./protocol.js";
import { endConnection, handleSession } from "./session-handler.js";

export interface ListenAddress {
  host: string;
  port: number;
}

export interface VerifierServer {
  address(): ListenAddress;
  /** Stop accepting, cancel running sessions and drop their sockets */
  close(): Promise<void>;
}

function describePeer(socket: Socket): string {
  return `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

/**
 * Bind the verifier port and serve each connection as an independent
 * session.
 *
 * @throws The bind error (EADDRINUSE, EACCES) when the port cannot be taken
 */
export async function startListener(
  context: ServiceContext
): Promise<VerifierServer> {
  const { config, logger, sessions } = context;
  const connections = new Set<Socket>();

  // Half-open: clients that send their input and shut down writing still
  // receive the response
  const server = createServer({ allowHalfOpen: true }, (socket) => {
    const peer = describePeer(socket);
    connections.add(socket);
    socket.once("close", () => connections.delete(socket));

    const controller = sessions.tryOpen();
    if (!controller) {
      recordSessionRejected();
      logWarn(
        "Connection rejected: session limit reached",
        { peer, maxSessions: sessions.maxSessions },
        logger
      );
      socket.on("error", (err) => {
        logger.debug({ err, peer }, "Rejected connection error");
      });
      endConnection(socket, BUSY_MESSAGE);
      return;
    }

    handleSession(socket, context, controller, peer)
      .catch((error: unknown) => {
        logError(error, { peer, operation: "handle_session" }, logger);
        socket.destroy();
      })
      .finally(() => sessions.release(controller));
  });

  await listen(server, config.port, config.host);

  // Accept failures after startup (EMFILE and friends) must not kill the process
  server.on("error", (error) => {
    logError(error, { operation: "accept" }, logger);
  });

  return {
    address() {
      const bound = server.address();
      if (bound === null || typeof bound === "string") {
        return { host: config.host, port: config.port };
      }
      return { host: bound.address, port: bound.port };
    },

    close() {
      return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        sessions.abortAll("server shutting down");
        for (const socket of connections) {
          socket.destroy();
        }
      });
    },
  };
}
