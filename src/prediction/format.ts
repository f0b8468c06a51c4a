import type { Forecast } from "../types.js";

export function probabilityText(probability: number): string {
  if (!Number.isFinite(probability) || probability < 0 || probability > 1) return "Unknown";
  if (probability < 0.1) return "Very Low";
  if (probability < 0.3) return "Low";
  if (probability < 0.6) return "Moderate";
  if (probability < 0.8) return "High";
  return "Very High";
}

export function confidenceText(confidence: number): string {
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) return "Unknown";
  if (confidence < 0.3) return "Low Confidence";
  if (confidence < 0.7) return "Medium Confidence";
  return "High Confidence";
}

/** "< 1 minute", "25 minutes", "1h 5m". */
export function durationText(minutes: number): string {
  if (!(minutes >= 1)) return "< 1 minute";
  if (minutes < 60) {
    const whole = Math.floor(minutes);
    return whole === 1 ? "1 minute" : `${whole} minutes`;
  }
  const hours = Math.floor(minutes / 60);
  const rest = Math.floor(minutes % 60);
  return `${hours}h ${rest}m`;
}

export function describeForecast(f: Forecast): string {
  const name = f.entityLabel || f.entityId;
  return (
    `${name}: ${probabilityText(f.probability)} chance of opening in the next ${f.horizonMinutes} min ` +
    `(${Math.round(f.probability * 100)}%, ${confidenceText(f.confidence).toLowerCase()}), ` +
    `expected duration ${durationText(f.expectedDurationMinutes)}`
  );
}
