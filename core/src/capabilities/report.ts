import { FilterCapabilityError } from '../filter/errors.js';
import type { AdapterCapabilities, FeatureName } from './types.js';

export function formatCapabilityReport(caps: AdapterCapabilities): string {
  const lines = [`Adapter: ${caps.adapter}${caps.version ? ` (${caps.version})` : ''}`];

  const features = Object.entries(caps.features);
  const on = features.filter(([, v]) => v).map(([k]) => k);
  const off = features.filter(([, v]) => !v).map(([k]) => k);
  lines.push(`Features: ${on.length ? on.join(', ') : 'none'}`);
  if (off.length) lines.push(`Missing: ${off.join(', ')}`);

  for (const [category, kinds] of Object.entries(caps.operators)) {
    for (const [kind, ops] of Object.entries(kinds)) {
      lines.push(`  ${category}/${kind}: ${ops.join(' ')}`);
    }
  }
  lines.push(`Max IN items: ${caps.limits.maxInItems ?? 'unlimited'}`);
  return lines.join('\n');
}

export function requireFeature(caps: AdapterCapabilities, feature: FeatureName, field: string): void {
  if (caps.features[feature]) return;
  throw new FilterCapabilityError(`${caps.adapter} does not support ${feature} (needed by ${field})`, {
    field,
    adapter: caps.adapter,
    feature,
  });
}
