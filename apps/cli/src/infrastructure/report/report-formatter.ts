import type { ScalingRegime } from '@usl/domain';
import type { CapacityReport, Prediction } from '@usl/cli/domain/types/capacity-report';

const LABEL_WIDTH = 28;
const COLUMN_WIDTH = 16;

export function formatNumber(value: number, precision: number): string {
  if (Number.isNaN(value)) {
    return 'n/a';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? 'unbounded' : '-unbounded';
  }
  if (value !== 0 && Math.abs(value) < 1e-3) {
    return value.toExponential(precision);
  }
  return value.toFixed(precision);
}

export function describeRegime(regime: ScalingRegime): string {
  const descriptions: Record<ScalingRegime, string> = {
    limitless: 'limitless (no coherency delay)',
    coherency: 'coherency-constrained',
    contention: 'contention-constrained',
    balanced: 'balanced (contention equals coherency)',
  };
  return descriptions[regime];
}

function line(label: string, value: string): string {
  return `  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function formatPrediction(prediction: Prediction, precision: number): string {
  const cells = prediction.reachable
    ? [prediction.concurrency, prediction.throughput, prediction.latency].map((value) => formatNumber(value, precision))
    : ['unreachable', '', ''];
  const basis = `${prediction.basis}=${formatNumber(prediction.value, precision)}`;
  return `  ${basis.padEnd(COLUMN_WIDTH + 8)}${cells.map((cell) => cell.padStart(COLUMN_WIDTH)).join('')}`.trimEnd();
}

export function formatReport(report: CapacityReport, precision: number): string {
  const { fit, peak } = report;
  const { model } = fit;
  const iterations = fit.method === 'refined' ? `, ${fit.iterations} iteration${fit.iterations === 1 ? '' : 's'}` : '';

  const lines = [
    `Model for ${report.source} (${fit.method}, ${fit.measurementCount} measurements${iterations})`,
    line('sigma (contention)', formatNumber(model.sigma, precision)),
    line('kappa (coherency)', formatNumber(model.kappa, precision)),
    line('lambda (ideal throughput)', formatNumber(model.lambda, precision)),
    line('peak concurrency', formatNumber(peak.concurrency, precision)),
    line('peak throughput', formatNumber(peak.throughput, precision)),
    line('regime', describeRegime(report.regime)),
    line('rmse (throughput)', formatNumber(fit.rootMeanSquaredError, precision)),
  ];

  if (!fit.converged) {
    lines.push(line('warning', 'refinement did not converge'));
  }

  if (report.predictions.length > 0) {
    const header = ['concurrency', 'throughput', 'latency'].map((title) => title.padStart(COLUMN_WIDTH)).join('');
    lines.push('', 'Predictions', `  ${'query'.padEnd(COLUMN_WIDTH + 8)}${header}`);
    for (const prediction of report.predictions) {
      lines.push(formatPrediction(prediction, precision));
    }
  }

  return `${lines.join('\n')}\n`;
}
