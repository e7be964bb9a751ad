import { Metrics, MetricUnit } from '@aws-lambda-powertools/metrics';

export type MetricUnitValue = (typeof MetricUnit)[keyof typeof MetricUnit];

/**
 * A wrapper for simple uses of CloudWatch Metrics.
 */
export class CloudWatchMetrics {
  private metrics: Metrics;

  constructor(options: { project?: string; serviceName?: string } = {}) {
    const project = options.project ?? process.env.PROJECT ?? 'unknownProject';
    this.metrics = new Metrics({ namespace: project, serviceName: options.serviceName || undefined });
  }

  /**
   * Add an entry for the metrics.
   */
  addMetric(metricName: string, value = 1, unit: MetricUnitValue = MetricUnit.Count): void {
    this.metrics.addMetric(metricName, unit, value);
  }
  /**
   * Add a metadata useful when you want to search highly contextual information along with your metrics in your logs.
   */
  addMetadata(key: string, value: string): void {
    this.metrics.addMetadata(key, value);
  }
  /**
   * Add an additional metrics dimension.
   */
  addDimension(name: string, value: string | undefined, defaultValue = '-'): void {
    this.metrics.addDimension(name, value ?? defaultValue);
  }
  /**
   * Synchronous function to actually publish your metrics.
   * It will create a new EMF blob and log it to be then ingested by Cloudwatch logs and processed for metrics creation.
   */
  publishStoredMetrics(): void {
    this.metrics.publishStoredMetrics();
  }
}
