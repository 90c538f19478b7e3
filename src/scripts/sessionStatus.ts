import { loadConfig } from '../config.js';
import { createSessionManager } from '../index.js';

/**
 * Restore the persisted session and print where the guard would send the
 * user. Handy when debugging a stuck login on a device image.
 */
export async function printSessionStatus(): Promise<void> {
  const config = loadConfig();
  const { machine, guard } = createSessionManager(config);

  console.log(`Session file: ${config.sessionFile}`);
  const state = await machine.restoreSession();

  if (state.status === 'authenticated') {
    const { user } = state.session;
    console.log(`✓ Signed in as ${user.email} (id ${user.id})`);
  } else {
    console.log(`Not signed in (state: ${state.status})`);
  }
  console.log(`Protected routes: ${guard.canAccessProtected() ? 'open' : 'redirect to ' + guard.loginPath}`);
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('sessionStatus.ts')) {
  printSessionStatus().catch((error: unknown) => {
    console.error('Session status failed:', error);
    process.exit(1);
  });
}
