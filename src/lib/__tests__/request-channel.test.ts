import { describe, it, expect, beforeEach } from "vitest";
import { RequestCancelledError, RequestChannel } from "../request-channel";

describe("RequestChannel", () => {
  let channel: RequestChannel<number>;

  beforeEach(() => {
    channel = new RequestChannel<number>();
  });

  it("drops values when nobody is waiting", () => {
    expect(channel.sendIfRequested(1)).toBe(false);
    expect(channel.isRequestPending()).toBe(false);
  });

  it("registers a request before request() returns", () => {
    const pending = channel.request();
    expect(channel.isRequestPending()).toBe(true);
    channel.sendIfRequested(0);
    return pending;
  });

  it("delivers exactly one value per request", async () => {
    const pending = channel.request();
    expect(channel.sendIfRequested(7)).toBe(true);
    expect(channel.sendIfRequested(8)).toBe(false);
    await expect(pending).resolves.toBe(7);
  });

  it("cancel() rejects the request with RequestCancelledError", async () => {
    const pending = channel.request();
    expect(channel.cancel()).toBe(true);
    await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
    await expect(pending).rejects.toThrow("Request cancelled");
    expect(channel.isRequestPending()).toBe(false);
  });

  it("cancel() without a request does nothing", () => {
    expect(channel.cancel("unused")).toBe(false);
  });

  it("accepts a new request after one completes", async () => {
    const first = channel.request();
    channel.sendIfRequested(1);
    await first;
    const second = channel.request();
    channel.sendIfRequested(2);
    await expect(second).resolves.toBe(2);
  });
});
