import type { Server } from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import { createLogger, errorMessage } from "@scriptrunner/shared";
import { streamJob } from "./broadcaster.js";
import type { JobLookup, ViewerChannel } from "./broadcaster.js";

const log = createLogger("live");

const JOB_PATH = /^\/ws\/([^/?#]+)\/?(?:\?.*)?$/;

export function jobIdFromPath(url: string | undefined): string | undefined {
  const match = url?.match(JOB_PATH);
  return match ? decodeURIComponent(match[1]) : undefined;
}

export function socketChannel(socket: WebSocket): ViewerChannel {
  return {
    send: (frame) =>
      new Promise((resolve, reject) => {
        socket.send(frame, (err) => (err ? reject(err) : resolve()));
      }),
    isOpen: () => socket.readyState === WebSocket.OPEN,
    close: () => {
      if (socket.readyState === WebSocket.OPEN) socket.close();
    },
  };
}

/** Serves `/ws/<jobId>` upgrades on `server`; any other upgrade is refused. */
export function attachLiveChannel(
  server: Server,
  jobs: JobLookup,
  pollIntervalMs: number
): { close: () => Promise<void> } {
  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (req, socket, head) => {
    const jobId = jobIdFromPath(req.url);
    if (!jobId) {
      socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      log.debug(`Viewer attached to ${jobId}`);
      streamJob(jobId, jobs, socketChannel(ws), { pollIntervalMs })
        .catch((err) => {
          log.debug(`Viewer of ${jobId} dropped: ${errorMessage(err)}`);
        });
    });
  });

  return {
    close: () =>
      new Promise<void>((resolve) => {
        for (const client of wss.clients) client.terminate();
        wss.close(() => resolve());
      }),
  };
}
