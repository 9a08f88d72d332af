export type BrokerageClientOptions = {
  baseUrl: string;
  accessToken?: string;
  tokenType?: string;
  timeoutMs?: number;
};

export type BrokerageHttpMethod = "GET" | "POST";

export type Paged<T> = {
  results?: Array<T | null>;
  next?: string | null;
};

export type QuoteRow = {
  symbol?: string;
  last_trade_price?: string | null;
  last_extended_hours_trade_price?: string | null;
};

export type InstrumentRow = {
  url: string;
  symbol: string;
  tradeable?: boolean;
};

export type AccountRow = {
  url: string;
  cash?: string;
  buying_power?: string;
};

export type PositionRow = {
  instrument: string;
  quantity?: string;
  average_buy_price?: string;
};

export type OrderState =
  | "queued"
  | "unconfirmed"
  | "confirmed"
  | "partially_filled"
  | "filled"
  | "rejected"
  | "cancelled"
  | "failed";

export type OrderRow = {
  id: string;
  state: OrderState;
  side?: "buy" | "sell";
  quantity?: string;
  cumulative_quantity?: string;
  average_price?: string | null;
  reject_reason?: string | null;
  ref_id?: string;
};

export type PlaceOrderParams = {
  account: string;
  instrument: string;
  symbol: string;
  side: "buy" | "sell";
  quantity: string;
  refId: string;
};

export class BrokerageHttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`Brokerage HTTP ${status}: ${body.slice(0, 250)}`);
    this.name = "BrokerageHttpError";
  }
}

export class BrokerageClient {
  private readonly baseUrl: string;
  private readonly accessToken?: string;
  private readonly tokenType: string;
  private readonly timeoutMs: number;

  constructor(options: BrokerageClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.accessToken = options.accessToken;
    this.tokenType = options.tokenType ?? "Bearer";
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async quotes(symbols: string[]): Promise<Paged<QuoteRow>> {
    return await this.request("/marketdata/quotes/", { query: { symbols: symbols.join(",") } });
  }

  async instruments(symbol: string): Promise<Paged<InstrumentRow>> {
    return await this.request("/instruments/", { query: { symbol } });
  }

  async instrument(url: string): Promise<InstrumentRow> {
    return await this.request(url);
  }

  async accounts(): Promise<Paged<AccountRow>> {
    return await this.request("/accounts/");
  }

  async positions(cursor?: string): Promise<Paged<PositionRow>> {
    return await this.request(cursor ?? "/positions/", cursor ? undefined : { query: { nonzero: "true" } });
  }

  async placeOrder(params: PlaceOrderParams): Promise<OrderRow> {
    return await this.request("/orders/", {
      method: "POST",
      body: {
        account: params.account,
        instrument: params.instrument,
        symbol: params.symbol,
        type: "market",
        time_in_force: "gfd",
        trigger: "immediate",
        quantity: params.quantity,
        side: params.side,
        ref_id: params.refId
      }
    });
  }

  async order(orderId: string): Promise<OrderRow> {
    return await this.request(`/orders/${encodeURIComponent(orderId)}/`);
  }

  private resolveUrl(pathOrUrl: string): URL {
    if (/^https?:\/\//i.test(pathOrUrl)) {
      return new URL(pathOrUrl);
    }
    return new URL(`${this.baseUrl}${pathOrUrl}`);
  }

  private async request<T>(
    pathOrUrl: string,
    options?: {
      method?: BrokerageHttpMethod;
      query?: Record<string, string | number | boolean | undefined>;
      body?: Record<string, unknown>;
    }
  ): Promise<T> {
    const url = this.resolveUrl(pathOrUrl);

    for (const [key, value] of Object.entries(options?.query ?? {})) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }

    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const method: BrokerageHttpMethod = options?.method ?? "GET";
      const res = await fetch(url, {
        method,
        headers: {
          Accept: "application/json",
          ...(options?.body ? { "Content-Type": "application/json" } : {}),
          ...(this.accessToken ? { Authorization: `${this.tokenType} ${this.accessToken}` } : {})
        },
        body: options?.body ? JSON.stringify(options.body) : undefined,
        signal: controller.signal
      });

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new BrokerageHttpError(res.status, text);
      }

      return (await res.json()) as T;
    } finally {
      clearTimeout(t);
    }
  }
}
