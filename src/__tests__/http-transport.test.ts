import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

// Mock undici fetch
vi.mock("undici", () => ({
  fetch: vi.fn(),
  ProxyAgent: vi.fn(),
}));

import { fetch as undiciFetch } from "undici";
import {
  InternalError,
  InvalidParameters,
  InvalidRequest,
  MethodNotFound,
  ServiceUnavailable,
  TooManyRequests,
  TransportError,
} from "../lib/errors";
import { HttpTransport, buildUrl } from "../lib/transport/http-transport";

const BASE_URL = "https://vpic.test/api/vehicles/";
const WMI_URL = "https://vpic.test/api/vehicles/DecodeWMI/1FT?format=json";

function respond(status: number, body: string, statusText = "") {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: () => Promise.resolve(body),
  };
}

function transport(retries = 0) {
  return new HttpTransport({ baseUrl: BASE_URL, retries, retryDelayMs: 0, timeoutMs: 50 });
}

const mockFetch = () => undiciFetch as ReturnType<typeof vi.fn>;

describe("buildUrl", () => {
  it("joins the base and path and appends parameters", () => {
    expect(buildUrl("https://vpic.nhtsa.dot.gov/api/vehicles", "DecodeWMI/1FT", { format: "json" })).toBe(
      "https://vpic.nhtsa.dot.gov/api/vehicles/DecodeWMI/1FT?format=json"
    );
  });

  it("drops undefined parameters and leading slashes", () => {
    expect(buildUrl(BASE_URL, "/GetAllMakes", { page: undefined, format: "json" })).toBe(
      "https://vpic.test/api/vehicles/GetAllMakes?format=json"
    );
  });

  it("encodes parameter values", () => {
    expect(buildUrl(BASE_URL, "GetParts", { fromDate: "1/1/2015" })).toBe(
      "https://vpic.test/api/vehicles/GetParts?fromDate=1%2F1%2F2015"
    );
  });
});

describe("HttpTransport", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the parsed JSON body", async () => {
    mockFetch().mockResolvedValue(respond(200, '{"Count":0,"Results":[]}'));

    const body = await transport().get("DecodeWMI/1FT", { format: "json" });

    expect(body).toEqual({ Count: 0, Results: [] });
    expect(undiciFetch).toHaveBeenCalledWith(
      WMI_URL,
      expect.objectContaining({
        method: "GET",
        body: undefined,
        headers: expect.objectContaining({ Accept: "application/json" }),
      })
    );
  });

  it("posts form data", async () => {
    mockFetch().mockResolvedValue(respond(200, '{"Results":[]}'));

    await transport().post(
      "DecodeVINValuesBatch",
      { DATA: "5YJSA1E2XMF000001;1FTMW1T88MFA00001" },
      { format: "json" }
    );

    expect(undiciFetch).toHaveBeenCalledWith(
      "https://vpic.test/api/vehicles/DecodeVINValuesBatch?format=json",
      expect.objectContaining({
        method: "POST",
        body: "DATA=5YJSA1E2XMF000001%3B1FTMW1T88MFA00001",
        headers: expect.objectContaining({ "Content-Type": "application/x-www-form-urlencoded" }),
      })
    );
  });

  it("raises MethodNotFound for a 404 with the server's message", async () => {
    mockFetch().mockResolvedValue(
      respond(404, '{"message":"No HTTP resource was found","messageDetail":"No action was found"}')
    );

    const error = await transport().get("DecodeWMI/1FT", { format: "json" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MethodNotFound);
    expect(error).toMatchObject({
      message: "No HTTP resource was found",
      detail: "No action was found",
      status: 404,
      url: WMI_URL,
    });
  });

  it("raises InvalidParameters when a 400 names the parameters dictionary", async () => {
    mockFetch().mockResolvedValue(
      respond(
        400,
        '{"message":"The request is invalid.","messageDetail":"The parameters dictionary contains a null entry for parameter \'year\'"}'
      )
    );

    await expect(transport().get("GetMakesForManufacturerAndYear/955")).rejects.toBeInstanceOf(
      InvalidParameters
    );
  });

  it("raises InvalidRequest for any other 400", async () => {
    mockFetch().mockResolvedValue(respond(400, '{"message":"The request is invalid."}'));

    const error = await transport().get("GetParts").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvalidRequest);
    expect(error).not.toBeInstanceOf(InvalidParameters);
  });

  it("falls back to the status line when the error body is not JSON", async () => {
    mockFetch().mockResolvedValue(respond(500, "<html>boom</html>", "Internal Server Error"));

    await expect(transport().get("DecodeWMI/1FT", { format: "json" })).rejects.toThrow(
      `HTTP 500 Internal Server Error for ${WMI_URL}`
    );
    await expect(transport().get("DecodeWMI/1FT")).rejects.toBeInstanceOf(InternalError);
  });

  it("retries a 429 and returns the next response", async () => {
    mockFetch()
      .mockResolvedValueOnce(respond(429, ""))
      .mockResolvedValueOnce(respond(200, '{"Results":[]}'));

    const body = await transport(2).get("GetAllMakes");

    expect(body).toEqual({ Results: [] });
    expect(undiciFetch).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith(
      "[vpic] 429 from https://vpic.test/api/vehicles/GetAllMakes, retrying in 0ms"
    );
  });

  it("cancels the body of a response it retries", async () => {
    const cancel = vi.fn().mockResolvedValue(undefined);
    mockFetch()
      .mockResolvedValueOnce({ ...respond(503, "busy"), body: { cancel } })
      .mockResolvedValueOnce(respond(200, '{"Results":[]}'));

    await transport(1).get("GetAllMakes");

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("gives up on 429 after the configured retries", async () => {
    mockFetch().mockResolvedValue(respond(429, "", "Too Many Requests"));

    await expect(transport(1).get("GetAllMakes")).rejects.toBeInstanceOf(TooManyRequests);
    expect(undiciFetch).toHaveBeenCalledTimes(2);
  });

  it("does not retry a 503 when retries are off", async () => {
    mockFetch().mockResolvedValue(respond(503, "", "Service Unavailable"));

    await expect(transport(0).get("GetAllMakes")).rejects.toBeInstanceOf(ServiceUnavailable);
    expect(undiciFetch).toHaveBeenCalledTimes(1);
  });

  it("does not retry other errors", async () => {
    mockFetch().mockResolvedValue(respond(404, ""));

    await expect(transport(2).get("GetAllMakes")).rejects.toBeInstanceOf(MethodNotFound);
    expect(undiciFetch).toHaveBeenCalledTimes(1);
  });

  it("raises TransportError for a malformed body", async () => {
    mockFetch().mockResolvedValue(respond(200, "{not json"));

    await expect(transport().get("DecodeWMI/1FT", { format: "json" })).rejects.toThrow(
      `Malformed JSON from ${WMI_URL}`
    );
  });

  it("wraps network failures", async () => {
    mockFetch().mockRejectedValue(new Error("socket hang up"));

    const error = await transport().get("GetAllMakes").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: "Request to https://vpic.test/api/vehicles/GetAllMakes failed: socket hang up",
      status: null,
    });
  });

  it("reports a timeout after the last attempt", async () => {
    const abort = Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
    mockFetch().mockRejectedValue(abort);

    await expect(transport(1).get("GetAllMakes")).rejects.toThrow(
      "Timed out after 50ms: https://vpic.test/api/vehicles/GetAllMakes"
    );
    expect(undiciFetch).toHaveBeenCalledTimes(2);
  });
});
