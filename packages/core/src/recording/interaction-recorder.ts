/**
 * Interaction Recorder
 *
 * Records every request issued through a transport.
 */

import type { Interaction, InteractionFilter } from "./recording.types";

/**
 * Interaction Recorder
 */
export class InteractionRecorder {
	private interactions: Map<string, Interaction> = new Map();
	private counter = 0;
	private enabled = true;

	enable(): void {
		this.enabled = true;
	}

	disable(): void {
		this.enabled = false;
	}

	isEnabled(): boolean {
		return this.enabled;
	}

	/**
	 * Start recording an interaction (request about to be sent).
	 * Returns an empty id while recording is disabled.
	 */
	startInteraction(params: { method: string; url: string }): string {
		if (!this.enabled) {
			return "";
		}

		const id = `interaction-${++this.counter}`;
		this.interactions.set(id, {
			id,
			method: params.method,
			url: params.url,
			status: "pending",
			startedAt: Date.now(),
			attempts: 0,
		});
		return id;
	}

	/**
	 * Complete an interaction (response received)
	 */
	completeInteraction(id: string, params: { statusCode: number; attempts: number; elapsedSeconds: number }): void {
		const interaction = this.interactions.get(id);
		if (!interaction) {
			return;
		}

		interaction.status = "completed";
		interaction.finishedAt = Date.now();
		interaction.statusCode = params.statusCode;
		interaction.attempts = params.attempts;
		interaction.elapsedSeconds = params.elapsedSeconds;
	}

	/**
	 * Mark an interaction as failed (no response ever received)
	 */
	failInteraction(id: string, params: { error: string; attempts: number }): void {
		const interaction = this.interactions.get(id);
		if (!interaction) {
			return;
		}

		interaction.status = "failed";
		interaction.finishedAt = Date.now();
		interaction.attempts = params.attempts;
		interaction.error = params.error;
	}

	/**
	 * Get all interactions in recording order
	 */
	getInteractions(): Interaction[] {
		return Array.from(this.interactions.values(), (interaction) => ({ ...interaction }));
	}

	/**
	 * Get interactions matching filter
	 */
	getFilteredInteractions(filter: InteractionFilter): Interaction[] {
		return this.getInteractions().filter((interaction) => {
			if (filter.method && interaction.method !== filter.method) {
				return false;
			}
			if (filter.status && interaction.status !== filter.status) {
				return false;
			}
			if (filter.statusCode !== undefined && interaction.statusCode !== filter.statusCode) {
				return false;
			}
			if (filter.filter && !filter.filter(interaction)) {
				return false;
			}
			return true;
		});
	}

	getInteraction(id: string): Interaction | undefined {
		const interaction = this.interactions.get(id);
		return interaction ? { ...interaction } : undefined;
	}

	getFailedInteractions(): Interaction[] {
		return this.getFilteredInteractions({ status: "failed" });
	}

	/**
	 * Get interaction summary
	 */
	getSummary(): {
		total: number;
		byStatus: Record<string, number>;
		byMethod: Record<string, number>;
		retried: number;
	} {
		const byStatus: Record<string, number> = {};
		const byMethod: Record<string, number> = {};
		let retried = 0;

		for (const interaction of this.interactions.values()) {
			byStatus[interaction.status] = (byStatus[interaction.status] || 0) + 1;
			byMethod[interaction.method] = (byMethod[interaction.method] || 0) + 1;
			if (interaction.attempts > 1) {
				retried++;
			}
		}

		return { total: this.interactions.size, byStatus, byMethod, retried };
	}

	clear(): void {
		this.interactions.clear();
	}

	get count(): number {
		return this.interactions.size;
	}
}
