import { readFileSync } from "node:fs";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createConnection, type FetchLike } from "@skycast/client";
import { createCaller } from "./router.js";

const fixture = readFileSync(new URL("../../client/src/fixtures/full-report.json", import.meta.url), "utf-8");

function callerWith(fetch: FetchLike) {
  const connection = createConnection("test-key", { baseUrl: "https://forecast.example.test/forecast", fetch });
  return createCaller({ connection });
}

describe("weather router", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns a view of the current report", async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(
      new Response(fixture, { headers: { "X-Forecast-API-Calls": "12" } }),
    );

    const view = await callerWith(fetch).weather.current({ lat: 37.8267, lon: -122.423 });

    expect(fetch).toHaveBeenCalledWith(
      "https://forecast.example.test/forecast/test-key/37.826700,-122.423000?units=auto&exclude=minutely,hourly",
    );
    expect(view).toEqual({
      latitude: 37.8267,
      longitude: -122.423,
      timezone: "America/Los_Angeles",
      callCount: 12,
      current: {
        time: "31/Dec/2020 - 16:00",
        summary: "Clear",
        temperature: 48.3,
        pressure: 1021.4,
        humidity: 0.73,
      },
      daily: {
        summary: "Light rain on Saturday.",
        days: [
          { date: "01/Jan/2021", summary: "Clear throughout the day.", temperatureMin: 44.2, temperatureMax: 57.9, pressure: 1021 },
          { date: "02/Jan/2021", summary: "Light rain in the afternoon.", temperatureMin: 46, temperatureMax: 55.3, pressure: 1015.2 },
        ],
      },
    });
  });

  it("reports missing blocks as null", async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(new Response('{"latitude":1,"longitude":2,"timezone":"UTC"}'));

    const view = await callerWith(fetch).weather.current({ lat: 1, lon: 2 });

    expect(view).toEqual({ latitude: 1, longitude: 2, timezone: "UTC", callCount: 0, current: null, daily: null });
  });

  it("rejects coordinates out of range before fetching", async () => {
    const fetch = vi.fn<FetchLike>();

    await expect(callerWith(fetch).weather.current({ lat: 91, lon: 0 })).rejects.toMatchObject({ code: "BAD_REQUEST" });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("surfaces a failed fetch", async () => {
    const fetch = vi.fn<FetchLike>().mockRejectedValue(new TypeError("fetch failed"));

    await expect(callerWith(fetch).weather.current({ lat: 1, lon: 2 })).rejects.toThrow("fetch failed");
    expect(console.error).toHaveBeenCalledWith("[Web] Forecast for 1,2 failed:", "fetch failed");
  });

  it("exposes the connection's call count", async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(
      new Response(fixture, { headers: { "X-Forecast-API-Calls": "3" } }),
    );
    const caller = callerWith(fetch);

    await expect(caller.weather.callCount()).resolves.toBe(0);
    await caller.weather.current({ lat: 1, lon: 2 });
    await expect(caller.weather.callCount()).resolves.toBe(3);
  });
});
