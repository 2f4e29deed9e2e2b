import dayjs from 'dayjs';
import { normalizeCategory, normalizeSubcategory } from '../../domain/entities/Categories.js';
import type { CandidateTransaction } from '../../domain/entities/Transaction.js';
import { isWithinRecencyWindow } from '../../domain/services/BillingPeriod.js';
import { aggregatePages } from '../../domain/services/Consensus.js';
import { type CategoryLabelDTO, CategoryLabelSchema } from '../dto/CategoryLabelDTO.js';
import type { ExtractedPageDTO, ExtractedRowDTO } from '../dto/ExtractedPageDTO.js';
import type { ExtractionIssue, FileExtraction } from '../dto/ReconciliationDTO.js';
import type { RenderedPageDTO, UploadedFileDTO } from '../dto/UploadedFileDTO.js';
import { formatError } from '../errors/ReconciliationErrors.js';
import type { CategorizerPort } from '../ports/CategorizerPort.js';
import type { DocumentRendererPort } from '../ports/DocumentRendererPort.js';
import type { PageExtractorPort } from '../ports/PageExtractorPort.js';

export const DEFAULT_RECENCY_WINDOW_YEARS = 3;

type PricedRow = ExtractedRowDTO & { amount: number };

const isPriced = (row: ExtractedRowDTO): row is PricedRow => row.amount !== null;

export interface ExtractionServiceOptions {
  recencyWindowYears: number;
  clock?: () => dayjs.Dayjs;
}

export class ExtractionService {
  private readonly clock: () => dayjs.Dayjs;

  constructor(
    private readonly renderer: DocumentRendererPort,
    private readonly extractor: PageExtractorPort,
    private readonly categorizer: CategorizerPort,
    private readonly options: ExtractionServiceOptions = { recencyWindowYears: DEFAULT_RECENCY_WINDOW_YEARS },
  ) {
    this.clock = options.clock ?? (() => dayjs());
  }

  async extract(file: UploadedFileDTO, renderOptions: { password?: string } = {}): Promise<FileExtraction> {
    let pages: RenderedPageDTO[];
    try {
      pages = await this.renderer.render(file, renderOptions);
    } catch (error) {
      console.warn(`⚠️ Could not open ${file.filename}:`, formatError(error));
      return this.emptyExtraction(file.filename, [
        { kind: 'UNREADABLE_FILE', filename: file.filename, reason: formatError(error) },
      ]);
    }

    // Pages run concurrently but are read back in page order so that consensus
    // ties never depend on which call finished first.
    const settled = await Promise.allSettled(pages.map((page) => this.extractor.extract(page)));
    const extracted: ExtractedPageDTO[] = [];
    let failedPages = 0;

    settled.forEach((result, position) => {
      if (result.status === 'fulfilled') {
        extracted.push(result.value);
        return;
      }

      failedPages += 1;
      console.warn(`⚠️ Page ${pages[position]?.index ?? position} of ${file.filename} unreadable:`, formatError(result.reason));
    });

    const consensus = aggregatePages(
      extracted.map((page) => ({
        cutoffDay: page.cutoff_day,
        issuerName: page.bank_name,
        cardName: page.card_name,
      })),
    );

    const allRows = extracted.flatMap((page) => page.transactions);
    const rows = allRows.filter(isPriced);
    if (rows.length < allRows.length) {
      console.log(`ℹ️ Dropped ${allRows.length - rows.length} rows from ${file.filename} without an amount`);
    }

    const expenses = rows.filter((row) => !row.is_payment);
    const now = this.clock();
    const recent = expenses.filter((row) =>
      isWithinRecencyWindow(row.trans_date, this.options.recencyWindowYears, now),
    );

    const skippedStale = expenses.length - recent.length;
    if (skippedStale > 0) {
      console.log(
        `ℹ️ Dropped ${skippedStale} rows from ${file.filename} dated more than ${this.options.recencyWindowYears} years back`,
      );
    }

    const issues: ExtractionIssue[] = [];
    if (failedPages > 0) {
      issues.push({
        kind: 'EXTRACTION_PARTIAL_FAILURE',
        filename: file.filename,
        failedPages,
        totalPages: pages.length,
      });
    }

    return {
      filename: file.filename,
      transactions: await this.label(recent),
      cutoffDay: consensus.cutoffDay,
      issuerSuggestion: consensus.issuerSuggestion,
      skippedPayments: rows.length - expenses.length,
      skippedStale,
      issues,
    };
  }

  private async label(rows: PricedRow[]): Promise<CandidateTransaction[]> {
    if (rows.length === 0) {
      return [];
    }

    let labels: CategoryLabelDTO[] = [];
    try {
      labels = CategoryLabelSchema.array().parse(await this.categorizer.label(rows.map((row) => row.description)));
    } catch (error) {
      console.warn('⚠️ Categorization failed, using the fallback category:', formatError(error));
    }

    return rows.map((row, index) => {
      const category = normalizeCategory(labels[index]?.category);

      return {
        transactionDate: row.trans_date,
        postingDate: row.posting_date,
        description: row.description,
        amount: row.amount,
        category,
        subcategory: normalizeSubcategory(category, labels[index]?.subcategory),
      };
    });
  }

  private emptyExtraction(filename: string, issues: ExtractionIssue[]): FileExtraction {
    return {
      filename,
      transactions: [],
      cutoffDay: null,
      issuerSuggestion: null,
      skippedPayments: 0,
      skippedStale: 0,
      issues,
    };
  }
}
