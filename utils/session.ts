export type Session = "Asia" | "London" | "NY";

// Janelas UTC aproximadas: Asia 23:00-06:59, London 07:00-14:59, NY 15:00-22:59.
export function sessionLabel(now: Date): Session {
  const h = now.getUTCHours();
  if (h >= 23 || h < 7) return "Asia";
  if (h < 15) return "London";
  return "NY";
}

export function formatUtc(now: Date): string {
  return now.toISOString().replace("T", " ").slice(0, 16);
}
