/** YYYY-MM-DD of an ISO timestamp, in UTC. */
export function utcDay(iso: string): string {
  return new Date(iso).toISOString().slice(0, 10);
}
