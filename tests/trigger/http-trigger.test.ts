import { beforeEach, describe, expect, it, vi } from "vitest";
import type { ComputeCostArgs, WorkerRef } from "../../src/common/types.js";
import { WorkerUnreachableError } from "../../src/common/errors.js";
import { createNodeKeys, sha256Hex } from "../../src/identity/keys.js";
import { HttpWorkerTrigger } from "../../src/trigger/http-trigger.js";

const mockRequest = vi.fn();
vi.mock("undici", () => ({ request: (...args: unknown[]) => mockRequest(...args) }));

function response(statusCode: number, text = "") {
  return { statusCode, body: { text: () => Promise.resolve(text) } };
}

const keys = createNodeKeys();
const worker: WorkerRef = {
  identity: { name: "worker1", domain: "cluster", publicKeyPem: "test-public-key" },
  address: "http://worker1.test/"
};
const args: ComputeCostArgs = {
  writer: "chief",
  domain: "cluster",
  networkLocation: "http://ledger.test",
  objective: "sum"
};

function trigger(retries = 2) {
  return new HttpWorkerTrigger({
    caller: { name: "chief", domain: "cluster" },
    privateKeyPem: keys.privateKeyPem,
    retries,
    retryDelayMs: 0
  });
}

describe("http worker trigger", () => {
  beforeEach(() => {
    mockRequest.mockReset();
  });

  it("posts a signed compute_cost call to the worker", async () => {
    mockRequest.mockResolvedValueOnce(response(202, '{"accepted":true}'));
    await trigger().invoke(worker, args);

    expect(mockRequest).toHaveBeenCalledTimes(1);
    const [url, options] = mockRequest.mock.calls[0];
    const body = JSON.stringify({ procedure: "compute_cost", args });
    expect(url).toBe("http://worker1.test/rpc/compute_cost");
    expect(options).toMatchObject({
      method: "POST",
      body,
      headers: { "x-node-id": "chief@cluster", "x-body-sha256": sha256Hex(body) }
    });
  });

  it("retries transient failures and then succeeds", async () => {
    mockRequest
      .mockRejectedValueOnce(new Error("connect ECONNREFUSED"))
      .mockResolvedValueOnce(response(503))
      .mockResolvedValueOnce(response(202));
    await trigger().invoke(worker, args);
    expect(mockRequest).toHaveBeenCalledTimes(3);
  });

  it("gives up after the configured retries", async () => {
    mockRequest.mockRejectedValue(new Error("connect ECONNREFUSED"));
    const error = await trigger(1)
      .invoke(worker, args)
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(WorkerUnreachableError);
    expect(error).toMatchObject({
      message: "worker worker1@cluster unreachable after 2 attempt(s): connect ECONNREFUSED"
    });
    expect(mockRequest).toHaveBeenCalledTimes(2);
  });

  it("does not retry a client error", async () => {
    mockRequest.mockResolvedValue(response(401, '{"error":"invalid_signature"}'));
    await expect(trigger().invoke(worker, args)).rejects.toThrow(
      'worker worker1@cluster unreachable after 1 attempt(s): status 401: {"error":"invalid_signature"}'
    );
    expect(mockRequest).toHaveBeenCalledTimes(1);
  });
});
