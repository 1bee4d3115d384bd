const PREFIX = '[sciencesource-sync]';

// stdout carries the MCP protocol, so everything goes to stderr
export function log(message: string): void {
  console.error(`${PREFIX} ${message}`);
}

export function warn(message: string): void {
  console.warn(`${PREFIX} ${message}`);
}
