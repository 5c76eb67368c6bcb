import { describe, expect, it, vi } from "vitest";
import { NotAvailableError, UpstreamError } from "../errors";
import { YouTubeCatalog, type FetchLike } from "./catalog";
import { createRetryPolicy } from "./retry";

const json = (body: unknown, init: ResponseInit = {}) =>
  new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" }, ...init });

const playlistItem = (videoId: string, title: string, publishedAt?: string) => ({
  snippet: { title, publishedAt, resourceId: { videoId } },
});

const videoItem = (id: string, title: string, publishedAt?: string) => ({
  id,
  snippet: { title, channelTitle: "Test Channel", publishedAt },
});

/** Answers by resource name; each route yields its responses in order. */
function fakeFetch(routes: Record<string, Array<() => Response>>) {
  const urls: URL[] = [];
  const fetch = vi.fn<FetchLike>(async (input) => {
    const url = new URL(input);
    urls.push(url);
    const resource = url.pathname.split("/").pop() ?? "";
    const next = routes[resource]?.shift();
    if (!next) throw new Error(`unexpected request to ${resource}`);
    return next();
  });
  return { fetch, urls };
}

const build = (fetch: FetchLike, overrides: Partial<ConstructorParameters<typeof YouTubeCatalog>[0]> = {}) =>
  new YouTubeCatalog({
    apiKey: "test-secret",
    fetch,
    retry: createRetryPolicy({ attempts: 3, delay: 1 }),
    sleep: () => Promise.resolve(),
    ...overrides,
  });

describe("YouTubeCatalog.listPlaylist", () => {
  it("follows page tokens and prefers the video's own publish date", async () => {
    const { fetch, urls } = fakeFetch({
      playlistItems: [
        () => json({ items: [playlistItem("v1", "One", "2024-01-01T00:00:00Z")], nextPageToken: "p2" }),
        () => json({ items: [playlistItem("v2", "Two")] }),
      ],
      videos: [
        () => json({ items: [videoItem("v1", "One", "2023-05-06T00:00:00Z")] }),
        () => json({ items: [] }),
      ],
    });
    const sleep = vi.fn(() => Promise.resolve());

    const videos = await build(fetch, { sleep }).listPlaylist("PL1");

    expect(videos).toEqual([
      { id: "v1", title: "One", publishedAt: "2023-05-06T00:00:00Z", thumbnail: undefined },
      { id: "v2", title: "Two", publishedAt: undefined, thumbnail: undefined },
    ]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(urls[0].searchParams.get("key")).toBe("test-secret");
    expect(urls[0].searchParams.get("maxResults")).toBe("50");
    expect(urls[2].searchParams.get("pageToken")).toBe("p2");
  });

  it("skips malformed items", async () => {
    const { fetch } = fakeFetch({
      playlistItems: [() => json({ items: [{ snippet: { title: "" } }, playlistItem("v1", "One")] })],
      videos: [() => json({ items: [] })],
    });

    const videos = await build(fetch).listPlaylist("PL1");

    expect(videos.map((video) => video.id)).toEqual(["v1"]);
  });

  it("stops at the item limit", async () => {
    const { fetch } = fakeFetch({
      playlistItems: [() => json({ items: [playlistItem("v1", "One"), playlistItem("v2", "Two")], nextPageToken: "p2" })],
      videos: [() => json({ items: [] })],
    });

    const videos = await build(fetch, { maxItems: 1 }).listPlaylist("PL1");

    expect(videos).toHaveLength(1);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("rejects an empty playlist", async () => {
    const { fetch } = fakeFetch({ playlistItems: [() => json({ items: [] })] });

    await expect(build(fetch).listPlaylist("PL1")).rejects.toThrow(
      new NotAvailableError("No valid videos found in playlist"),
    );
  });

  it("retries server errors", async () => {
    const { fetch } = fakeFetch({
      playlistItems: [
        () => json({ error: { message: "backend" } }, { status: 503 }),
        () => json({ items: [playlistItem("v1", "One")] }),
      ],
      videos: [() => json({ items: [] })],
    });

    const videos = await build(fetch).listPlaylist("PL1");

    expect(videos).toHaveLength(1);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it("maps a missing playlist to a 404 without retrying", async () => {
    const { fetch } = fakeFetch({
      playlistItems: [() => json({ error: { message: "gone", errors: [{ reason: "playlistNotFound" }] } }, { status: 404 })],
    });

    const error = await build(fetch).listPlaylist("PL1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ message: "Playlist not found or not accessible", statusCode: 404 });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("treats a body that is not JSON as invalid playlist data", async () => {
    const { fetch } = fakeFetch({
      playlistItems: [() => new Response("<html>maintenance</html>", { status: 200 })],
    });

    const error = await build(fetch).listPlaylist("PL1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ message: "Invalid playlist data received from YouTube", statusCode: 502 });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("reports an exhausted quota", async () => {
    const { fetch } = fakeFetch({
      playlistItems: [() => json({ error: { errors: [{ reason: "quotaExceeded" }] } }, { status: 403 })],
    });

    await expect(build(fetch).listPlaylist("PL1")).rejects.toMatchObject({
      message: "YouTube API quota exceeded",
      statusCode: 503,
    });
  });

  it("times out once the deadline has passed", async () => {
    let clock = 0;
    const { fetch } = fakeFetch({
      playlistItems: [
        () => {
          clock = 31_000;
          return json({ items: [playlistItem("v1", "One")] });
        },
      ],
    });

    await expect(build(fetch, { now: () => clock }).listPlaylist("PL1")).rejects.toMatchObject({
      message: "Playlist fetch operation timed out",
      statusCode: 504,
    });
  });
});

describe("YouTubeCatalog.getVideo", () => {
  it("returns the video's details", async () => {
    const { fetch, urls } = fakeFetch({ videos: [() => json({ items: [videoItem("v1", "One", "2024-02-03T00:00:00Z")] })] });

    await expect(build(fetch).getVideo("v1")).resolves.toEqual({
      id: "v1",
      title: "One",
      channelTitle: "Test Channel",
      publishedAt: "2024-02-03T00:00:00Z",
    });
    expect(urls[0].searchParams.get("id")).toBe("v1");
  });

  it("rejects an unknown video", async () => {
    const { fetch } = fakeFetch({ videos: [() => json({ items: [] })] });

    await expect(build(fetch).getVideo("nope")).rejects.toThrow("Video nope not found or is not accessible");
  });
});
