import type { CategorizerPort } from '../../application/ports/CategorizerPort.js';
import type { DocumentRendererPort } from '../../application/ports/DocumentRendererPort.js';
import type { PageExtractorPort } from '../../application/ports/PageExtractorPort.js';
import type { StoragePort } from '../../application/ports/StoragePort.js';
import { ExtractionService } from '../../application/services/ExtractionService.js';
import { FingerprintIndex } from '../../application/services/FingerprintIndex.js';
import { ReconciliationService } from '../../application/services/ReconciliationService.js';
import { StatementMatcher } from '../../application/services/StatementMatcher.js';
import { TransactionOverlapDetector } from '../../application/services/TransactionOverlapDetector.js';
import { RuleBasedCategorizer } from '../adapters/categorizer/RuleBasedCategorizer.js';
import { OpenRouterPageExtractor } from '../adapters/extraction/OpenRouterPageExtractor.js';
import { PdfPageRenderer } from '../adapters/extraction/PdfPageRenderer.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { SqliteStorageAdapter } from '../adapters/storage/SqliteStorageAdapter.js';
import { type AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  storage?: StoragePort;
  renderer?: DocumentRendererPort;
  extractor?: PageExtractorPort;
  categorizer?: CategorizerPort;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly storage: StoragePort;
  readonly renderer: DocumentRendererPort;
  readonly extractor: PageExtractorPort;
  readonly categorizer: CategorizerPort;
  readonly fingerprintIndex: FingerprintIndex;
  readonly statementMatcher: StatementMatcher;
  readonly overlapDetector: TransactionOverlapDetector;
  readonly extractionService: ExtractionService;
  readonly reconciliationService: ReconciliationService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    const { storage, extraction, reconciliation } = this.config;

    this.storage =
      overrides.storage ??
      (storage.driver === 'sqlite'
        ? new SqliteStorageAdapter(storage.databasePath)
        : new InMemoryStorageAdapter());
    this.renderer = overrides.renderer ?? new PdfPageRenderer();
    this.extractor =
      overrides.extractor ??
      new OpenRouterPageExtractor({
        apiKey: extraction.apiKey,
        baseUrl: extraction.baseUrl,
        model: extraction.model,
        timeoutMs: extraction.timeoutMs,
      });
    this.categorizer = overrides.categorizer ?? new RuleBasedCategorizer();

    this.fingerprintIndex = new FingerprintIndex(this.storage);
    this.statementMatcher = new StatementMatcher(this.storage, reconciliation.amountTolerance);
    this.overlapDetector = new TransactionOverlapDetector(this.storage, reconciliation.amountSlack);
    this.extractionService = new ExtractionService(this.renderer, this.extractor, this.categorizer, {
      recencyWindowYears: reconciliation.recencyWindowYears,
    });
    this.reconciliationService = new ReconciliationService(
      this.storage,
      this.fingerprintIndex,
      this.statementMatcher,
      this.overlapDetector,
      this.extractionService,
      { softOverlapThreshold: reconciliation.softOverlapThreshold },
    );
  }

  hasLiveExtraction(): boolean {
    return this.extractor.isAvailable();
  }
}
