import { describe, it, expect, vi } from "vitest";
import type { AxiosAdapter, InternalAxiosRequestConfig } from "axios";

import { BrevoContactGateway, type BrevoGatewayOptions } from "../../src/clients/BrevoContactGateway";
import {
  ConfigurationError,
  ContactValidationError,
  FatalContactError,
  TransientContactError,
} from "../../src/contracts/errors";
import type { Sleep } from "../../src/contracts/concurrency";
import { makeContact } from "../../src/delegates/ContactPayloadBuilder";

type Scripted = { status: number; data?: unknown; headers?: Record<string, string> } | Error;

// answers each request with the next scripted outcome; the last one repeats
function scriptedAdapter(script: Scripted[]) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const next = script[Math.min(calls.length - 1, script.length - 1)];
    if (next instanceof Error) throw next;
    return {
      status: next.status,
      statusText: "",
      data: next.data ?? {},
      headers: next.headers ?? {},
      config,
    };
  };
  return { adapter, calls };
}

function makeGateway(script: Scripted[], opts: Partial<BrevoGatewayOptions> = {}) {
  const { adapter, calls } = scriptedAdapter(script);
  const sleep = vi.fn<Sleep>(() => Promise.resolve());
  const gateway = new BrevoContactGateway({
    apiKey: "test-secret",
    baseUrl: "https://brevo.test/v3//",
    dryRun: false,
    retry: { maxRetries: 3, backoffBaseMs: 100 },
    adapter,
    sleep,
    ...opts,
  });
  return { gateway, calls, sleep };
}

const contact = makeContact({
  email: "test@example.com",
  listIds: [7],
  attributes: { FUNNEL_TYPE: "language" },
});

describe("BrevoContactGateway.upsertContact", () => {
  it("posts the contact to /contacts with the api key and returns the response body", async () => {
    const { gateway, calls } = makeGateway([{ status: 201, data: { id: 42 } }]);

    const res = await gateway.upsertContact(contact);

    expect(res).toEqual({ id: 42 });
    expect(calls).toHaveLength(1);
    const req = calls[0];
    expect(req.method).toBe("post");
    expect(req.baseURL).toBe("https://brevo.test/v3");
    expect(req.url).toBe("/contacts");
    expect(req.headers["api-key"]).toBe("test-secret");
    expect(req.headers["Accept"]).toBe("application/json");
    expect(JSON.parse(String(req.data))).toEqual({
      email: "test@example.com",
      updateEnabled: true,
      listIds: [7],
      attributes: { FUNNEL_TYPE: "language" },
    });
  });

  it("leaves empty list ids and attributes out of the body", async () => {
    const { gateway, calls } = makeGateway([{ status: 204, data: "" }]);

    const res = await gateway.upsertContact(makeContact({ email: "test@example.com" }));

    expect(res).toEqual({});
    expect(JSON.parse(String(calls[0].data))).toEqual({ email: "test@example.com", updateEnabled: true });
  });

  it("retries 5xx responses with exponential backoff until one succeeds", async () => {
    const { gateway, calls, sleep } = makeGateway([
      { status: 503, data: "unavailable" },
      { status: 502, data: "bad gateway" },
      { status: 200, data: { id: 1 } },
    ]);

    await expect(gateway.upsertContact(contact)).resolves.toEqual({ id: 1 });
    expect(calls).toHaveLength(3);
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([100, 200]);
  });

  it("gives up after maxRetries + 1 attempts and surfaces the last transient failure", async () => {
    const { gateway, calls, sleep } = makeGateway([{ status: 500, data: "boom" }], {
      retry: { maxRetries: 2, backoffBaseMs: 100 },
    });

    const err = await gateway.upsertContact(contact).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientContactError);
    expect(err).toMatchObject({ status: 500, message: "Brevo API error 500: boom" });
    expect(calls).toHaveLength(3);
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([100, 200]);
  });

  it("does not retry other 4xx responses", async () => {
    const { gateway, calls, sleep } = makeGateway([{ status: 400, data: { code: "invalid_parameter" } }]);

    const err = await gateway.upsertContact(contact).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FatalContactError);
    expect(err).toMatchObject({ status: 400, message: 'Brevo API error 400: {"code":"invalid_parameter"}' });
    expect(calls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("truncates long error bodies to 500 characters", async () => {
    const { gateway } = makeGateway([{ status: 422, data: "x".repeat(800) }]);

    const err = await gateway.upsertContact(contact).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FatalContactError);
    expect(err).toMatchObject({ message: `Brevo API error 422: ${"x".repeat(500)}` });
  });

  it("waits at least Retry-After on 429", async () => {
    const { gateway, calls, sleep } = makeGateway(
      [{ status: 429, data: "slow down", headers: { "retry-after": "2" } }, { status: 201, data: { id: 3 } }],
      { retry: { maxRetries: 1, backoffBaseMs: 100 } },
    );

    await expect(gateway.upsertContact(contact)).resolves.toEqual({ id: 3 });
    expect(calls).toHaveLength(2);
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([2000]);
  });

  it("treats a transport failure as transient", async () => {
    const { gateway, calls } = makeGateway([new Error("socket hang up")], {
      retry: { maxRetries: 1, backoffBaseMs: 10 },
    });

    const err = await gateway.upsertContact(contact).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientContactError);
    expect(err).toMatchObject({ message: "Brevo request error: socket hang up" });
    expect(calls).toHaveLength(2);
  });

  it("short-circuits in dry-run mode without a key or any request", async () => {
    const { gateway, calls } = makeGateway([{ status: 500 }], { dryRun: true, apiKey: undefined });

    await expect(gateway.upsertContact(contact)).resolves.toEqual({ dryRun: true });
    expect(calls).toHaveLength(0);
  });

  it("refuses to call the API without a key", async () => {
    const { gateway, calls } = makeGateway([{ status: 200 }], { apiKey: "  " });

    await expect(gateway.upsertContact(contact)).rejects.toBeInstanceOf(ConfigurationError);
    expect(calls).toHaveLength(0);
  });

  it("rejects invalid contacts before any I/O", async () => {
    const { gateway, calls } = makeGateway([{ status: 200 }]);

    await expect(gateway.upsertContact(makeContact({ email: " " }))).rejects.toBeInstanceOf(ContactValidationError);
    await expect(
      gateway.upsertContact(makeContact({ email: "test@example.com", listIds: [0] })),
    ).rejects.toBeInstanceOf(ContactValidationError);
    expect(calls).toHaveLength(0);
  });
});
