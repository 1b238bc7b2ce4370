import { describe, it, expect, vi } from "vitest";
import { AxiosError, type AxiosAdapter } from "axios";
import { DataFetchError, createHttpClient } from "../market/dataFetcher";

const URL = "https://av.test/query";

describe("createHttpClient", () => {
  it("returns the response body and sends the query params", async () => {
    const adapter = vi.fn<AxiosAdapter>(async (config) => ({
      data: { "Global Quote": { "05. price": "187.5000" } },
      status: 200,
      statusText: "OK",
      headers: {},
      config,
    }));
    const http = createHttpClient(2500, { adapter });

    const body = await http.getJson(URL, { function: "GLOBAL_QUOTE", symbol: "TEST" });

    expect(body).toEqual({ "Global Quote": { "05. price": "187.5000" } });
    expect(adapter).toHaveBeenCalledTimes(1);
    const config = adapter.mock.calls[0][0];
    expect(config.url).toBe(URL);
    expect(config.params).toEqual({ function: "GLOBAL_QUOTE", symbol: "TEST" });
    expect(config.timeout).toBe(2500);
  });

  it("wraps a failed request in DataFetchError", async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError("Request failed with status code 503", AxiosError.ERR_BAD_RESPONSE, config);
    };
    const http = createHttpClient(2500, { adapter });

    const request = http.getJson(URL, { function: "GLOBAL_QUOTE" });

    await expect(request).rejects.toThrow(DataFetchError);
    await expect(request).rejects.toThrow(`GET ${URL} failed: Request failed with status code 503`);
  });

  it("reports a timeout the same way", async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError(`timeout of ${config.timeout}ms exceeded`, AxiosError.ECONNABORTED, config);
    };
    const http = createHttpClient(10, { adapter });

    await expect(http.getJson(URL, {})).rejects.toThrow(`GET ${URL} failed: timeout of 10ms exceeded`);
  });
});
