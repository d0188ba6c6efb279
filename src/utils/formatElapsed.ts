const pad = (n: number): string => String(n).padStart(2, '0');

// H:MM:SS, with a "N day(s), " prefix past 24 hours.
export function formatElapsed(totalSeconds: number): string {
  const seconds = Math.floor(totalSeconds);
  const days = Math.floor(seconds / 86_400);
  const hours = Math.floor((seconds % 86_400) / 3_600);
  const minutes = Math.floor((seconds % 3_600) / 60);
  const secs = seconds % 60;

  const clock = `${hours}:${pad(minutes)}:${pad(secs)}`;
  if (days === 0) return clock;
  return `${days} ${days === 1 ? 'day' : 'days'}, ${clock}`;
}
