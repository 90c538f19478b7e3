import { isAuthenticated } from '../../domain/auth/state.js';
import { AuthStateSource } from './authStateMachine.js';

export interface RouteGuardOptions {
  loginPath?: string;
  homePath?: string;
  /** Pages reachable without a session. Signed-in users are sent home from these. */
  publicPaths?: readonly string[];
}

function normalizePath(path: string): string {
  const bare = path.split(/[?#]/)[0] ?? '';
  if (bare.length > 1 && bare.endsWith('/')) {
    return bare.replace(/\/+$/, '') || '/';
  }
  return bare || '/';
}

/**
 * Navigation gate over the authentication state.
 *
 * Only an authenticated state opens protected routes. Unknown counts as signed
 * out, so nothing protected renders before a restore has finished.
 */
export class RouteGuard {
  readonly loginPath: string;
  readonly homePath: string;
  private readonly publicPaths: ReadonlySet<string>;

  constructor(
    private readonly source: AuthStateSource,
    options: RouteGuardOptions = {}
  ) {
    this.loginPath = normalizePath(options.loginPath ?? '/login');
    this.homePath = normalizePath(options.homePath ?? '/dashboard');
    this.publicPaths = new Set(
      (options.publicPaths ?? [this.loginPath, '/signup']).map(normalizePath)
    );
  }

  canAccessProtected(): boolean {
    return isAuthenticated(this.source.currentState());
  }

  isPublic(path: string): boolean {
    return this.publicPaths.has(normalizePath(path));
  }

  /**
   * Where to send a navigation to `path`, or null to let it through.
   */
  resolve(path: string): string | null {
    const authenticated = this.canAccessProtected();

    if (this.isPublic(path)) {
      return authenticated ? this.homePath : null;
    }
    return authenticated ? null : this.loginPath;
  }

  /**
   * Notify when access to protected routes is gained or lost.
   */
  onAccessChange(listener: (canAccess: boolean) => void): () => void {
    return this.source.onChange((state, previous) => {
      const now = isAuthenticated(state);
      if (now !== isAuthenticated(previous)) {
        listener(now);
      }
    });
  }
}
