const QUEUE_NAMES: ReadonlyMap<number, string> = new Map([
  [400, "Normal Draft"],
  [420, "Ranked Solo/Duo"],
  [430, "Normal Blind"],
  [440, "Ranked Flex"],
  [450, "ARAM"],
  [700, "Clash"],
  [830, "Co-op vs AI Intro"],
  [840, "Co-op vs AI Beginner"],
  [850, "Co-op vs AI Intermediate"],
  [900, "URF"],
]);

export function isTrackedQueue(queueId: number): boolean {
  return QUEUE_NAMES.has(queueId);
}

export function getQueueName(queueId: number): string {
  return QUEUE_NAMES.get(queueId) ?? "Unknown";
}
