import { initTRPC } from "@trpc/server";
import { z } from "zod";
import { normalizeTimes } from "@skycast/client";
import type { WebContext } from "./context.js";
import { toWeatherView } from "./view.js";

const t = initTRPC.context<WebContext>().create();

// The page only shows current conditions and the daily outlook
export const PAGE_EXCLUDES = ["minutely", "hourly"];

export const weatherRouter = t.router({
  current: t.procedure
    .input(
      z.object({
        lat: z.number().min(-90).max(90),
        lon: z.number().min(-180).max(180),
      }),
    )
    .query(async ({ ctx, input }) => {
      try {
        const report = normalizeTimes(await ctx.connection.fetchCurrent(input.lat, input.lon, PAGE_EXCLUDES));
        const callCount = await ctx.connection.getCallCount();
        console.log(`[Web] Forecast for ${input.lat},${input.lon} (calls today: ${callCount})`);
        return toWeatherView(report, callCount);
      } catch (err) {
        console.error(`[Web] Forecast for ${input.lat},${input.lon} failed:`, err instanceof Error ? err.message : String(err));
        throw err;
      }
    }),

  callCount: t.procedure.query(({ ctx }) => ctx.connection.getCallCount()),
});

export const appRouter = t.router({
  weather: weatherRouter,
});

export type AppRouter = typeof appRouter;

export const createCaller = t.createCallerFactory(appRouter);
