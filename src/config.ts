// src/config.ts
import 'dotenv/config'; // Load .env file variables into process.env

// --- Spanner Configuration ---
// Tool calls may omit project/instance/database when a default is configured here.
const spannerConfig = {
  projectId: process.env.SPANNER_PROJECT_ID || process.env.GOOGLE_CLOUD_PROJECT || undefined,
  instanceId: process.env.SPANNER_INSTANCE_ID || undefined,
  databaseId: process.env.SPANNER_DATABASE_ID || undefined,
  // Read by the client library itself; kept here for the startup log only.
  emulatorHost: process.env.SPANNER_EMULATOR_HOST || undefined,
};

// --- Plan Report Configuration ---
function parseBooleanFlag(name: string, value: string | undefined): boolean {
  if (value === undefined || value === '') return false;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized !== 'false' && normalized !== '0') {
    console.warn(`${name} has unrecognized value '${value}'. Treating it as false.`);
  }
  return false;
}

const planConfig = {
  showChildLinks: parseBooleanFlag('PLAN_SHOW_CHILD_LINKS', process.env.PLAN_SHOW_CHILD_LINKS),
};

// --- Startup Summary ---
// Use console.error: stdout is reserved for MCP traffic.
export function logConfigSummary(): void {
  const defaults = [
    spannerConfig.projectId ? `project=${spannerConfig.projectId}` : null,
    spannerConfig.instanceId ? `instance=${spannerConfig.instanceId}` : null,
    spannerConfig.databaseId ? `database=${spannerConfig.databaseId}` : null,
  ].filter(Boolean);

  if (defaults.length > 0) {
    console.error(`Default Spanner target: ${defaults.join(', ')}`);
  } else {
    console.error("No default Spanner target configured. Tool calls must pass project, instance and database.");
  }
  if (spannerConfig.emulatorHost) {
    console.error(`SPANNER_EMULATOR_HOST is set (${spannerConfig.emulatorHost}); requests go to the emulator.`);
  }
  console.error(`Plan reports ${planConfig.showChildLinks ? 'include' : 'omit'} child-link annotations.`);
}

export { spannerConfig, planConfig };
