import type { UrlGeneratorPort } from "../ports/url-generator.js";
import { AppError } from "./app-error.js";

export const PAYMENT_FINALIZE_ROUTE = "payment.finalize.transaction";

const DEFAULT_ROUTES: Record<string, string> = {
  [PAYMENT_FINALIZE_ROUTE]: "/payment/finalize-transaction",
};

export class RouteUrlGenerator implements UrlGeneratorPort {
  private readonly routes: Record<string, string>;

  constructor(
    private readonly baseUrl: string,
    routes: Record<string, string> = {},
  ) {
    this.routes = { ...DEFAULT_ROUTES, ...routes };
  }

  absolute(routeName: string, parameters: Record<string, string>): string {
    const path = this.routes[routeName];
    if (path === undefined) {
      throw new AppError(500, "route_not_found", `Route '${routeName}' is not registered.`);
    }
    const url = new URL(path, this.baseUrl);
    for (const [name, value] of Object.entries(parameters)) {
      url.searchParams.set(name, value);
    }
    return url.toString();
  }
}
