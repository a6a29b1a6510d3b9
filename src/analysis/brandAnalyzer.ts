import type { ReviewAggregator } from '../aggregation/aggregator.js';
import { parseRawText } from '../aggregation/input.js';
import { toReportPayload, type ReportPayload } from '../aggregation/report.js';
import { collectReviews, type CollectOptions } from '../collectors/collect.js';
import type { ReviewCollector } from '../collectors/collector.js';
import { InvalidArgumentError } from '../errors.js';
import type { Logger } from '../logging.js';
import type { AggregateReport, ReviewItem } from '../types/index.js';

export interface BrandAnalysisRequest {
  brandName: string;
  /** Newline-delimited reviews; when empty the collectors are queried instead. */
  text?: string;
}

export interface BrandAnalysis {
  brandName: string;
  report: AggregateReport;
  payload: ReportPayload;
}

export interface BrandAnalyzerOptions {
  collectors: readonly ReviewCollector[];
  collect?: Omit<CollectOptions, 'logger'>;
  logger?: Logger;
}

export class BrandAnalyzer {
  private readonly collectors: readonly ReviewCollector[];
  private readonly collectOptions: Omit<CollectOptions, 'logger'>;
  private readonly logger: Logger | undefined;

  constructor(private readonly aggregator: ReviewAggregator, options: BrandAnalyzerOptions) {
    this.collectors = options.collectors;
    this.collectOptions = options.collect ?? {};
    this.logger = options.logger;
  }

  async analyze(request: BrandAnalysisRequest): Promise<BrandAnalysis> {
    const brandName = request.brandName.trim();
    if (!brandName) {
      throw new InvalidArgumentError('brand_name is required');
    }

    const items = await this.gather(brandName, request.text);
    const report = await this.aggregator.aggregate(items);
    return { brandName, report, payload: toReportPayload(brandName, report) };
  }

  private async gather(brandName: string, text: string | undefined): Promise<ReviewItem[]> {
    if (text && text.trim() !== '') {
      const items = parseRawText(text);
      this.logger?.(`Analyzing ${items.length} supplied review(s) for ${brandName}.`);
      return items;
    }

    if (this.collectors.length === 0) {
      this.logger?.('No collectors configured; nothing to analyze.');
      return [];
    }

    this.logger?.(`Collecting reviews for ${brandName} from ${this.collectors.map((c) => c.id).join(', ')}...`);
    const { items } = await collectReviews(this.collectors, brandName, { ...this.collectOptions, logger: this.logger });
    return items;
  }
}
