/**
 * Stage timing for the heavier pipeline operations
 * Written to stderr: stdout carries the tool protocol
 */

import { config } from "../config.js";

// Performance timing helper (works in both Node.js and browser)
export const perfNow = typeof performance !== "undefined" && performance.now
    ? () => performance.now()
    : () => Date.now();

/**
 * Logs per-stage timings as "[PERF] label" followed by one line per mark
 */
export function reportPerf(label: string, totalMs: number, marks: Record<string, number>): void {
    if (!config.perfLogs) {
        return;
    }

    console.error(`[PERF] ${label}:`);
    console.error(`  Total: ${totalMs.toFixed(2)}ms`);
    Object.entries(marks).forEach(([key, value]) => {
        const share = totalMs > 0 ? (value / totalMs) * 100 : 0;
        console.error(`  ${key}: ${value.toFixed(2)}ms (${share.toFixed(1)}%)`);
    });
}
