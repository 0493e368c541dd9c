import type { ComparisonResult, Coordinates, NormalizedEstimate } from '../types/Ride';
import { formatMinorUnits } from '../utils/money';

export interface PlaceLabels {
  pickup?: string;
  dropoff?: string;
}

/**
 * Plain-text report of a comparison, one line per provider
 */
export function formatComparisonText(result: ComparisonResult, labels: PlaceLabels = {}): string {
  const { request } = result;
  const lines: string[] = [
    'RIDE COMPARISON',
    '===============',
    `Pickup:  ${labels.pickup ?? formatCoordinates(request.pickup)}`,
    `Dropoff: ${labels.dropoff ?? formatCoordinates(request.dropoff)}`,
    `Class:   ${request.vehicleClass}`,
    '',
    'Estimates:',
    ...result.estimates.map(formatEstimateLine),
    '',
  ];

  if (result.status === 'selected') {
    const { winner } = result;
    const approximation = winner.source === 'simulated' ? ' (simulated approximation)' : '';
    lines.push(`Cheapest: ${winner.provider.toUpperCase()} at ${winner.amount} ${winner.currency}${approximation}`);
  } else {
    lines.push('No viable provider could price this ride.');
  }

  return lines.join('\n');
}

function formatEstimateLine(estimate: NormalizedEstimate): string {
  const name = estimate.provider.toUpperCase().padEnd(5);

  if (!estimate.viable) {
    return `- ${name} | not available (${estimate.reason})`;
  }

  const digits = estimate.amount.includes('.') ? estimate.amount.length - estimate.amount.indexOf('.') - 1 : 0;
  const price = estimate.upperAmountMinor !== undefined && estimate.upperAmountMinor > estimate.amountMinor
    ? `${estimate.amount}-${formatMinorUnits(estimate.upperAmountMinor, digits)}`
    : estimate.amount;
  const eta = estimate.durationSeconds !== undefined ? `${Math.round(estimate.durationSeconds / 60)} min` : '? min';

  return `- ${name} | ${estimate.source.padEnd(9)} | ${price} ${estimate.currency} | ${eta}`;
}

function formatCoordinates(point: Coordinates): string {
  return `${point.latitude.toFixed(4)}, ${point.longitude.toFixed(4)}`;
}
