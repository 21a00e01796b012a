import path from 'node:path';
import type { Logger } from 'pino';
import { AuthService } from '../../application/services/AuthService.js';
import { FinanceService } from '../../application/services/FinanceService.js';
import { QueryService } from '../../application/services/QueryService.js';
import { ClockPort } from '../../application/ports/ClockPort.js';
import { FinanceStorePort } from '../../application/ports/FinanceStorePort.js';
import { QueryResponderPort } from '../../application/ports/QueryResponderPort.js';
import { UserDirectoryPort } from '../../application/ports/UserDirectoryPort.js';
import { SystemClock } from '../adapters/clock/SystemClock.js';
import { RuleBasedQueryResponder } from '../adapters/responder/RuleBasedQueryResponder.js';
import { InMemoryFinanceStore } from '../adapters/storage/InMemoryFinanceStore.js';
import { InMemoryUserDirectory } from '../adapters/storage/InMemoryUserDirectory.js';
import { JsonDocumentFile } from '../adapters/storage/JsonDocumentFile.js';
import { JsonFileFinanceStore } from '../adapters/storage/JsonFileFinanceStore.js';
import { JsonFileUserDirectory } from '../adapters/storage/JsonFileUserDirectory.js';
import { AppConfig, loadConfig } from '../config/Config.js';
import { createLogger } from '../logging/Logger.js';
import { DEMO_PHONE, demoFinancialRecord, demoUserProfile, seedDemoData } from './seedDemoData.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  logger?: Logger;
  users?: UserDirectoryPort;
  financeStore?: FinanceStorePort;
  queryResponder?: QueryResponderPort;
  clock?: ClockPort;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: Logger;

  readonly users: UserDirectoryPort;
  readonly financeStore: FinanceStorePort;
  readonly queryResponder: QueryResponderPort;
  readonly clock: ClockPort;
  readonly authService: AuthService;
  readonly financeService: FinanceService;
  readonly queryService: QueryService;

  private readonly documents?: { users: JsonDocumentFile; finance: JsonDocumentFile };

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? createLogger(this.config.logging.level);

    if (this.config.storage.driver === 'json') {
      const storageLogger = this.logger.child({ module: 'storage' });
      this.documents = {
        users: new JsonDocumentFile(path.join(this.config.storage.dataDir, 'users.json'), storageLogger),
        finance: new JsonDocumentFile(path.join(this.config.storage.dataDir, 'finance.json'), storageLogger),
      };
    }

    const seedMemory = this.config.storage.seedDemoData;
    this.users =
      overrides.users ??
      (this.documents
        ? new JsonFileUserDirectory(this.documents.users)
        : new InMemoryUserDirectory(seedMemory ? [demoUserProfile()] : []));
    this.financeStore =
      overrides.financeStore ??
      (this.documents
        ? new JsonFileFinanceStore(this.documents.finance)
        : new InMemoryFinanceStore(seedMemory ? { [DEMO_PHONE]: demoFinancialRecord() } : {}));
    this.queryResponder = overrides.queryResponder ?? new RuleBasedQueryResponder();
    this.clock = overrides.clock ?? new SystemClock();

    this.authService = new AuthService(this.users, this.financeStore);
    this.financeService = new FinanceService(this.financeStore);
    this.queryService = new QueryService(
      this.financeStore,
      this.queryResponder,
      this.clock,
      this.logger.child({ module: 'query' }),
    );
  }

  /** Creates the starter documents when seeding is enabled and JSON storage is in use. */
  async prepareStorage(): Promise<void> {
    if (!this.documents || !this.config.storage.seedDemoData) {
      return;
    }

    await seedDemoData(this.documents, this.logger.child({ module: 'seed' }));
  }
}
