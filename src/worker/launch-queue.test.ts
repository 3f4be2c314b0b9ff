import { describe, expect, it, vi } from "vitest";

import { deferred, flush } from "@/test-support/deferred";

import { createLaunchQueue } from "./launch-queue";

describe("createLaunchQueue", () => {
  describe("enqueue", () => {
    it("should run at most `concurrency` launches at a time", async () => {
      const queue = createLaunchQueue({ concurrency: 1 });
      const started: string[] = [];
      const first = deferred<string>();

      const db = queue.enqueue("db", async () => {
        started.push("db");
        return first.promise;
      });
      const cache = queue.enqueue("cache", async () => {
        started.push("cache");
        return "cache-1";
      });
      await flush();

      expect(started).toEqual(["db"]);
      expect(db.getStatus()).toBe("running");
      expect(cache.getStatus()).toBe("pending");
      expect(queue.getPendingCount()).toBe(2);

      first.resolve("db-1");
      await expect(db.promise).resolves.toBe("db-1");
      await expect(cache.promise).resolves.toBe("cache-1");

      expect(started).toEqual(["db", "cache"]);
      expect(queue.getStatus("db")).toBe("completed");
      expect(queue.getStatus("cache")).toBe("completed");
    });

    it("should start every launch at once without a limit", async () => {
      const queue = createLaunchQueue();
      const gate = deferred();
      const started: string[] = [];

      for (const service of ["db", "store", "api"]) {
        queue.enqueue(service, async () => {
          started.push(service);
          await gate.promise;
        });
      }
      await flush();

      expect(started).toEqual(["db", "store", "api"]);
      gate.resolve();
      await queue.waitForIdle();
    });

    it("should mark failed launches and propagate the error", async () => {
      const queue = createLaunchQueue();

      const job = queue.enqueue("db", async () => {
        throw new Error("port in use");
      });

      await expect(job.promise).rejects.toThrow("port in use");
      expect(job.getStatus()).toBe("failed");
    });

    it("should return null status for services never queued", () => {
      expect(createLaunchQueue().getStatus("db")).toBeNull();
    });
  });

  describe("cancellation", () => {
    it("should settle a cancelled queued launch without running it", async () => {
      const queue = createLaunchQueue({ concurrency: 1 });
      const blocker = deferred();
      const fn = vi.fn(async () => "never");

      queue.enqueue("db", () => blocker.promise);
      const api = queue.enqueue("api", fn);
      await flush();

      api.cancel();

      await expect(api.promise).rejects.toThrow("Launch of api was cancelled");
      expect(api.getStatus()).toBe("cancelled");

      blocker.resolve();
      await queue.waitForIdle();
      expect(fn).not.toHaveBeenCalled();
    });

    it("should abort the signal of a running launch", async () => {
      const queue = createLaunchQueue();
      let received: AbortSignal | undefined;

      const job = queue.enqueue("db", (signal) => {
        received = signal;
        return new Promise<never>(() => {});
      });
      await flush();

      job.cancel();

      await expect(job.promise).rejects.toMatchObject({ name: "AbortError" });
      expect(received?.aborted).toBe(true);
      expect(job.getStatus()).toBe("cancelled");
    });

    it("should cancel when the caller's signal aborts", async () => {
      const queue = createLaunchQueue();
      const controller = new AbortController();

      const job = queue.enqueue("db", () => new Promise<never>(() => {}), controller.signal);
      controller.abort(new Error("shutdown"));

      await expect(job.promise).rejects.toThrow("shutdown");
      expect(job.getStatus()).toBe("cancelled");
    });

    it("should cancel every pending and running launch", async () => {
      const queue = createLaunchQueue({ concurrency: 1 });

      const db = queue.enqueue("db", () => new Promise<never>(() => {}));
      const api = queue.enqueue("api", async () => "api-1");
      await flush();

      queue.cancelAll();

      await expect(db.promise).rejects.toMatchObject({ name: "AbortError" });
      await expect(api.promise).rejects.toMatchObject({ name: "AbortError" });
      expect(queue.getStatus("db")).toBe("cancelled");
      expect(queue.getStatus("api")).toBe("cancelled");
    });

    it("should wait for a cancelled launch whose operation is still running", async () => {
      const queue = createLaunchQueue();
      const launch = deferred<string>();

      const job = queue.enqueue("db", () => launch.promise);
      await flush();
      job.cancel();
      await expect(job.promise).rejects.toMatchObject({ name: "AbortError" });

      let settled = false;
      const waiting = queue.waitForInFlight().then(() => {
        settled = true;
      });
      await flush();
      expect(settled).toBe(false);

      launch.resolve("db-1");
      await waiting;
      expect(settled).toBe(true);
    });

    it("should leave settled launches alone", async () => {
      const queue = createLaunchQueue();

      const job = queue.enqueue("db", async () => "db-1");
      await job.promise;
      job.cancel();

      expect(job.getStatus()).toBe("completed");
    });
  });
});
