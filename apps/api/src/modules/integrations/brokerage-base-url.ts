import type { AppConfig } from "@autopilot/shared";
import { DEFAULT_BROKERAGE_BASE_URL } from "@autopilot/shared";

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

export function resolveBrokerageBaseUrl(config: AppConfig | null): string {
  const configured = config?.brokerage.baseUrl.trim();
  if (configured) return normalizeBaseUrl(configured);

  return DEFAULT_BROKERAGE_BASE_URL;
}
