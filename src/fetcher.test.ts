import { AxiosError, InternalAxiosRequestConfig } from "axios";
import { createHttpFetcher, createStaticFetcher } from "./fetcher";
import { createHttpClient } from "./core/utils";

describe("createHttpFetcher", () => {
  it("should return the page body with a rotated User-Agent", async () => {
    const http = createHttpClient(1000);
    const seen: InternalAxiosRequestConfig[] = [];
    http.defaults.adapter = async (config) => {
      seen.push(config);
      return { data: "<p>ok</p>", status: 200, statusText: "OK", headers: {}, config };
    };

    const result = await createHttpFetcher(http, 0).fetch("https://directory.test/");

    expect(result).toEqual({
      success: true,
      page: { url: "https://directory.test/", html: "<p>ok</p>" },
    });
    expect(String(seen[0].headers["User-Agent"])).toMatch(/^Mozilla\/5\.0/);
  });

  it("should retry once and then report the first error", async () => {
    const http = createHttpClient(1000);
    let calls = 0;
    http.defaults.adapter = async (config) => {
      calls++;
      throw new AxiosError("timeout of 1000ms exceeded", "ECONNABORTED", config);
    };

    const result = await createHttpFetcher(http, 0).fetch("https://slow.test/");

    expect(calls).toBe(2);
    expect(result).toEqual({
      success: false,
      error: { url: "https://slow.test/", status_code: null, error_message: "Request timed out" },
    });
  });
});

describe("createStaticFetcher", () => {
  it("should serve known pages and 404 the rest, recording every request", async () => {
    const fetcher = createStaticFetcher({ "https://a.test/": "<p>A</p>" });

    expect(await fetcher.fetch("https://a.test/")).toEqual({
      success: true,
      page: { url: "https://a.test/", html: "<p>A</p>" },
    });
    expect(await fetcher.fetch("https://b.test/")).toEqual({
      success: false,
      error: { url: "https://b.test/", status_code: 404, error_message: "HTTP 404: Not Found" },
    });
    expect(fetcher.requested).toEqual(["https://a.test/", "https://b.test/"]);
  });
});
