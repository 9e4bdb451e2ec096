/**
 * Minimal test harness for standalone test scripts.
 *
 * Run a test file with: node --import tsx <file>
 * Each file calls finish() last; a failed test makes the process exit with 1.
 */

let passed = 0;
let failed = 0;

export function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

export function finish(suite: string): void {
  console.log("\n───────────────────────────────────────────────────────────────");
  console.log(`${suite}: ${passed} passed, ${failed} failed`);
  console.log("───────────────────────────────────────────────────────────────\n");
  if (failed > 0) {
    process.exit(1);
  }
}
