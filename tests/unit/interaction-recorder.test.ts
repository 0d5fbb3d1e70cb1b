/**
 * Interaction Recorder Tests
 */

import { InteractionRecorder } from "restprobe";
import { beforeEach, describe, expect, it } from "vitest";

describe("InteractionRecorder", () => {
	let recorder: InteractionRecorder;

	beforeEach(() => {
		recorder = new InteractionRecorder();
	});

	describe("enable/disable", () => {
		it("should be enabled by default", () => {
			expect(recorder.isEnabled()).toBe(true);
		});

		it("should not record when disabled", () => {
			recorder.disable();
			const id = recorder.startInteraction({ method: "GET", url: "http://api.test/posts" });

			expect(id).toBe("");
			expect(recorder.count).toBe(0);
		});

		it("should record again once re-enabled", () => {
			recorder.disable();
			recorder.enable();

			expect(recorder.startInteraction({ method: "GET", url: "http://api.test/posts" })).toBe("interaction-1");
		});
	});

	describe("startInteraction", () => {
		it("should number interactions per recorder", () => {
			const other = new InteractionRecorder();

			expect(recorder.startInteraction({ method: "GET", url: "http://api.test/a" })).toBe("interaction-1");
			expect(recorder.startInteraction({ method: "GET", url: "http://api.test/b" })).toBe("interaction-2");
			expect(other.startInteraction({ method: "GET", url: "http://api.test/c" })).toBe("interaction-1");
		});

		it("should start as pending", () => {
			const id = recorder.startInteraction({ method: "POST", url: "http://api.test/posts" });

			expect(recorder.getInteraction(id)).toMatchObject({
				method: "POST",
				url: "http://api.test/posts",
				status: "pending",
				attempts: 0,
			});
		});
	});

	describe("completeInteraction", () => {
		it("should store the outcome", () => {
			const id = recorder.startInteraction({ method: "GET", url: "http://api.test/posts" });
			recorder.completeInteraction(id, { statusCode: 200, attempts: 2, elapsedSeconds: 0.05 });

			const interaction = recorder.getInteraction(id);
			expect(interaction).toMatchObject({ status: "completed", statusCode: 200, attempts: 2, elapsedSeconds: 0.05 });
			expect(interaction?.finishedAt).toBeDefined();
		});

		it("should ignore unknown ids", () => {
			recorder.completeInteraction("interaction-99", { statusCode: 200, attempts: 1, elapsedSeconds: 0 });
			expect(recorder.count).toBe(0);
		});
	});

	describe("failInteraction", () => {
		it("should store the error", () => {
			const id = recorder.startInteraction({ method: "GET", url: "http://api.test/posts" });
			recorder.failInteraction(id, { error: "connection refused", attempts: 4 });

			expect(recorder.getInteraction(id)).toMatchObject({ status: "failed", error: "connection refused", attempts: 4 });
			expect(recorder.getFailedInteractions()).toHaveLength(1);
		});
	});

	describe("queries", () => {
		beforeEach(() => {
			const a = recorder.startInteraction({ method: "GET", url: "http://api.test/posts" });
			recorder.completeInteraction(a, { statusCode: 200, attempts: 1, elapsedSeconds: 0.01 });
			const b = recorder.startInteraction({ method: "POST", url: "http://api.test/posts" });
			recorder.completeInteraction(b, { statusCode: 201, attempts: 3, elapsedSeconds: 0.02 });
			const c = recorder.startInteraction({ method: "GET", url: "http://api.test/posts/9" });
			recorder.failInteraction(c, { error: "timeout", attempts: 4 });
		});

		it("should filter by method, status and status code", () => {
			expect(recorder.getFilteredInteractions({ method: "GET" })).toHaveLength(2);
			expect(recorder.getFilteredInteractions({ status: "completed" })).toHaveLength(2);
			expect(recorder.getFilteredInteractions({ statusCode: 201 }).map((i) => i.method)).toEqual(["POST"]);
			expect(recorder.getFilteredInteractions({ filter: (i) => i.url.endsWith("/9") })).toHaveLength(1);
		});

		it("should summarize", () => {
			expect(recorder.getSummary()).toEqual({
				total: 3,
				byStatus: { completed: 2, failed: 1 },
				byMethod: { GET: 2, POST: 1 },
				retried: 2,
			});
		});

		it("should hand out copies", () => {
			const [first] = recorder.getInteractions();
			first.status = "failed";

			expect(recorder.getInteractions()[0].status).toBe("completed");
		});

		it("should clear", () => {
			recorder.clear();
			expect(recorder.count).toBe(0);
		});
	});
});
