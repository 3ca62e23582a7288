import { describe, expect, it } from "vitest";
import {
  AuthExpiredError,
  RateLimitedError,
  SpotifyApiError,
  TransientFetchError,
  classifyCatalogError
} from "../src/errors";

describe("classifyCatalogError", () => {
  it("maps a 429 without a header to the default hour", () => {
    const classified = classifyCatalogError(new SpotifyApiError(429, "Too many requests"), "fetching playlists");

    expect(classified).toBeInstanceOf(RateLimitedError);
    expect(classified).toMatchObject({ retryAfterSeconds: 3600 });
  });

  it("reads the retry delay from a 429 message when there is no header", () => {
    const classified = classifyCatalogError(
      new SpotifyApiError(429, "Max retries reached. Retry will occur after: 12 s"),
      "fetching playlists"
    );

    expect(classified).toMatchObject({ retryAfterSeconds: 12 });
  });

  it("recognises throttles from the message alone", () => {
    const classified = classifyCatalogError(
      new Error("Rate limit exceeded, retry after 5 seconds"),
      "fetching playlists"
    );

    expect(classified).toBeInstanceOf(RateLimitedError);
    expect(classified).toMatchObject({ retryAfterSeconds: 5 });
  });

  it("matches only an actual rate limit phrase", () => {
    expect(classifyCatalogError(new Error("rate-limit hit"), "x")).toBeInstanceOf(RateLimitedError);
    expect(classifyCatalogError(new Error("RATELIMIT"), "x")).toBeInstanceOf(RateLimitedError);

    const unrelated = classifyCatalogError(new Error("Failed to generate playlist: limit reached"), "x");
    expect(unrelated).toBeInstanceOf(TransientFetchError);
    expect(classifyCatalogError(new Error("Cannot iterate past the page limit"), "x")).toBeInstanceOf(
      TransientFetchError
    );
  });

  it("maps 401 and expiry messages to expired credentials", () => {
    expect(classifyCatalogError(new SpotifyApiError(401, "Unauthorized"), "x")).toBeInstanceOf(AuthExpiredError);
    expect(classifyCatalogError(new Error("The access token expired"), "x")).toBeInstanceOf(AuthExpiredError);
  });

  it("wraps anything else as a transient fetch error", () => {
    const cause = new Error("ECONNRESET");
    const classified = classifyCatalogError(cause, "fetching playlists");

    expect(classified).toBeInstanceOf(TransientFetchError);
    expect(classified.message).toBe("Failed while fetching playlists: ECONNRESET");
    expect(classified.cause).toBe(cause);
  });

  it("treats a server error as transient", () => {
    const classified = classifyCatalogError(
      new SpotifyApiError(503, "Spotify API request failed with status 503"),
      "fetching liked songs"
    );

    expect(classified).toBeInstanceOf(TransientFetchError);
  });

  it("passes already classified errors through", () => {
    const throttle = new RateLimitedError(10, "Rate limited");

    expect(classifyCatalogError(throttle, "x")).toBe(throttle);
  });
});
