import { describe, it, expect, afterEach } from "vitest";
import { HEALTH_RESPONSE, createHealthServer, type HealthServer } from "./health.js";

describe("createHealthServer", () => {
  let server: HealthServer | null = null;

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  it("answers every path with 200", async () => {
    server = createHealthServer(0, "127.0.0.1");
    const port = await server.start();

    const response = await fetch(`http://127.0.0.1:${port}/anything`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe(HEALTH_RESPONSE);
  });

  it("stops cleanly when never started", async () => {
    await expect(createHealthServer(0).stop()).resolves.toBeUndefined();
  });
});
