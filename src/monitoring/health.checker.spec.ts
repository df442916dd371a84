import axios, { AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { checkHealth } from "./health.checker";

function http(fail: Error | null) {
  return axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      if (fail) throw fail;
      return { data: "<html></html>", status: 200, statusText: "OK", headers: {}, config };
    },
  });
}

describe("checkHealth", () => {
  it("should be healthy while the site answers", async () => {
    const report = await checkHealth({
      siteUrl: "https://site.test",
      solverConfigured: true,
      telegramEnabled: false,
      http: http(null),
    });

    expect(report.status).toBe("healthy");
    expect(report.checks.site.status).toBe("up");
    expect(report.checks.solver).toEqual({ configured: true });
    expect(report.checks.telegram).toEqual({ enabled: false });
  });

  it("should be unhealthy when the site is unreachable", async () => {
    const report = await checkHealth({
      siteUrl: "https://site.test",
      solverConfigured: false,
      telegramEnabled: true,
      http: http(new Error("getaddrinfo ENOTFOUND site.test")),
    });

    expect(report.status).toBe("unhealthy");
    expect(report.checks.site).toMatchObject({ status: "down", error: "getaddrinfo ENOTFOUND site.test" });
  });
});
