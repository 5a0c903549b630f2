import type { ForecastConnection } from "@skycast/client";

export interface WebContext {
  connection: ForecastConnection;
}
