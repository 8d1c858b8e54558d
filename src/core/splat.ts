/**
 * Renders an object as a PowerShell parameter splat for copy/paste
 */

function quote(value: string): string {
  return `"${value.replace(/`/g, '``').replace(/\$/g, '`$').replace(/"/g, '""')}"`;
}

function render(value: unknown): string {
  if (value === null || value === undefined) {
    return '$null';
  }
  if (typeof value === 'boolean') {
    return value ? '$true' : '$false';
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `@(${value.map(render).join(', ')})`;
  }
  if (typeof value === 'string') {
    return quote(value);
  }
  return quote(JSON.stringify(value));
}

export function formatParamSplat(obj: object, variableName: string = 'params'): string {
  const lines = Object.entries(obj).map(
    ([key, value]: [string, unknown]) => `    ${key} = ${render(value)}`
  );
  return [`$${variableName} = @{`, ...lines, '}'].join('\n');
}
