import type { SyncCoordinator } from "@mdlive/core";

/** Messages a slow browser may fall behind by before its channel counts as full. */
const MAX_BUFFERED = 64;

/**
 * Opens one live-update channel as a server-sent event stream. The session
 * is registered with the coordinator until the client disconnects or a send
 * finds the stream closed or full.
 */
export function openLiveSession(coordinator: SyncCoordinator, signal?: AbortSignal): Response {
  const encoder = new TextEncoder();
  let subscriberId: string | undefined;

  const close = () => {
    if (subscriberId) coordinator.unsubscribe(subscriberId);
    subscriberId = undefined;
  };

  const stream = new ReadableStream<Uint8Array>(
    {
      start(controller) {
        controller.enqueue(encoder.encode(": connected\n\n"));
        subscriberId = coordinator.subscribe((message) => {
          if (controller.desiredSize === null || controller.desiredSize <= 0) return false;
          controller.enqueue(encoder.encode(`data: ${JSON.stringify(message)}\n\n`));
          return true;
        }).id;
        signal?.addEventListener("abort", close, { once: true });
      },
      cancel() {
        close();
      },
    },
    { highWaterMark: MAX_BUFFERED },
  );

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
}
