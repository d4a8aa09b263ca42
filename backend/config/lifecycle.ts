// Process lifecycle flags read by the readiness probe and the shutdown path.
// Kept in their own module so index.ts and the routes do not import each other.

let ready = false;
let shuttingDown = false;

/** True once the HTTP server is listening and not draining. */
export function isReady(): boolean {
  return ready && !shuttingDown;
}

export function setReady(value: boolean): void {
  ready = value;
}

export function isShuttingDown(): boolean {
  return shuttingDown;
}

export function setShuttingDown(value: boolean): void {
  shuttingDown = value;
}
