import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpCardRenderer, RendererHandle, type CardRenderer } from "../src/services/renderer";
import type { CardRenderRequest } from "../src/types/api";

class CountingRenderer implements CardRenderer {
  initializeCalls = 0;
  closeCalls = 0;
  failNextInitialize = false;

  async initialize(): Promise<void> {
    this.initializeCalls += 1;
    if (this.failNextInitialize) {
      this.failNextInitialize = false;
      throw new Error("render service unavailable");
    }
  }

  async render(): Promise<Buffer> {
    return Buffer.from("png");
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

const request: CardRenderRequest = {
  text: "hello",
  persona: "Hatsune Miku",
  font_size: 42,
  line_spacing: 1.2,
  curve_enabled: false,
  offset_x: 0,
  offset_y: 0,
  curve_intensity: 0.5,
  shadow_enabled: true,
  emoji_set: "apple",
};

describe("RendererHandle", () => {
  it("initializes once for concurrent first acquires", async () => {
    const renderer = new CountingRenderer();
    const handle = new RendererHandle(renderer);
    expect(handle.state).toBe("uninitialized");

    const [first, second] = await Promise.all([handle.acquire(), handle.acquire()]);

    expect(first).toBe(renderer);
    expect(second).toBe(renderer);
    expect(renderer.initializeCalls).toBe(1);
    expect(handle.state).toBe("ready");
    expect(handle.activeLeases).toBe(2);

    handle.release();
    handle.release();
    handle.release();
    expect(handle.activeLeases).toBe(0);
  });

  it("retries initialization after a failure", async () => {
    const renderer = new CountingRenderer();
    renderer.failNextInitialize = true;
    const handle = new RendererHandle(renderer);

    await expect(handle.acquire()).rejects.toThrow("render service unavailable");
    expect(handle.state).toBe("uninitialized");

    await handle.acquire();
    expect(renderer.initializeCalls).toBe(2);
    expect(handle.state).toBe("ready");
  });

  it("closes the renderer once and refuses later acquires", async () => {
    const renderer = new CountingRenderer();
    const handle = new RendererHandle(renderer);
    await handle.acquire();

    await handle.close();
    await handle.close();

    expect(handle.state).toBe("closed");
    expect(renderer.closeCalls).toBe(1);
    await expect(handle.acquire()).rejects.toThrow("Renderer has been closed");
  });

  it("does not close a renderer that never started", async () => {
    const renderer = new CountingRenderer();
    const handle = new RendererHandle(renderer);

    await handle.close();

    expect(renderer.closeCalls).toBe(0);
    expect(renderer.initializeCalls).toBe(0);
  });
});

describe("HttpCardRenderer", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the render request and returns the image bytes", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(new Uint8Array([1, 2, 3])));
    vi.stubGlobal("fetch", fetchMock);
    const renderer = new HttpCardRenderer({ baseUrl: "http://render.test/", timeoutMs: 1000 });

    const image = await renderer.render(request);

    expect([...image]).toEqual([1, 2, 3]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://render.test/api/cards/render/raw");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual(request);
  });

  it("surfaces the service's error detail", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ detail: "unknown persona" }), { status: 422 }))
    );
    const renderer = new HttpCardRenderer({ baseUrl: "http://render.test", timeoutMs: 1000 });

    await expect(renderer.render(request)).rejects.toThrow("unknown persona");
  });

  it("checks the service health on initialize", async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response(JSON.stringify({ status: "healthy", service: "card-renderer" }))
    );
    vi.stubGlobal("fetch", fetchMock);
    const renderer = new HttpCardRenderer({ baseUrl: "http://render.test", timeoutMs: 1000 });

    await renderer.initialize();

    expect(fetchMock.mock.calls[0][0]).toBe("http://render.test/health");
    expect(fetchMock.mock.calls[0][1]?.method).toBe("GET");
  });
});
