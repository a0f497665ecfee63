import { vi } from "vitest";
import type { ResolutionEvent, ResolutionPublisher } from "../../src/application/ports/services";

export function createMockResolutionPublisher(): ResolutionPublisher & {
  _events: ResolutionEvent[];
} {
  const events: ResolutionEvent[] = [];

  return {
    _events: events,
    publish: vi.fn((event: ResolutionEvent) => {
      events.push(event);
    })
  };
}
