/**
 * Search-as-you-type Example
 * Demonstrates keyed supersession and observer-driven cancellation
 */

import {
	isCancellation,
	scope,
	sleep,
	type TaskContext,
} from "../src/index.js";

// Mock search backend
async function searchBackend(
	query: string,
	signal: AbortSignal,
): Promise<string[]> {
	await sleep(50 + query.length * 20, signal);
	return ["apple", "apricot", "banana", "blueberry"].filter((item) =>
		item.startsWith(query),
	);
}

function search(query: string) {
	return async ({ signal, name }: TaskContext): Promise<void> => {
		try {
			const results = await searchBackend(query, signal);
			console.log(`  ${name}: ${results.join(", ") || "(no results)"}`);
		} catch (error) {
			if (isCancellation(error)) {
				console.log(`  ${name}: cancelled`);
			}
			throw error;
		}
	};
}

async function main() {
	console.log("=== Search-as-you-type ===\n");

	const panel = scope({ name: "search-panel", logLevel: "warn" });
	const visibility = new AbortController();

	// The panel stays observed until it is hidden
	panel.observeWhile(visibility.signal);

	console.log("Typing 'a', 'ap', 'apr' quickly:");
	for (const query of ["a", "ap", "apr"]) {
		panel.submit(search(query), { key: "search", name: `search "${query}"` });
		await sleep(10, new AbortController().signal);
	}
	await sleep(200, new AbortController().signal);

	console.log("\nTyping 'b' then hiding the panel:");
	panel.submit(search("b"), { key: "search", name: 'search "b"' });
	visibility.abort();
	await sleep(100, new AbortController().signal);

	console.log("\nTyping while hidden:");
	panel.submit(search("blue"), { key: "search", name: 'search "blue"' });
	console.log(`  live tasks: ${panel.taskCount}`);
}

main().catch(console.error);
