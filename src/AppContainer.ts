import { AppConfig } from './infrastructure/config/AppConfig.js';
import { ActivityCatalog } from './domain/entities/Activity.js';
import { InMemoryActivityRepository } from './infrastructure/persistence/in-memory/InMemoryActivityRepository.js';
import { loadActivitySeed } from './infrastructure/persistence/seed/ActivitySeedLoader.js';
import { InMemoryEventDispatcher } from './infrastructure/messaging/InMemoryEventDispatcher.js';
import { ConsoleLogger, ILogger } from './infrastructure/observability/Logger.js';
import { ListActivities } from './application/use-cases/implementation/ListActivities.js';
import { SignUpForActivity } from './application/use-cases/implementation/SignUpForActivity.js';
import { UnregisterFromActivity } from './application/use-cases/implementation/UnregisterFromActivity.js';
import { RosterAuditHandler } from './application/handlers/RosterAuditHandler.js';
import { ActivitiesController } from './interface-adapters/controllers/ActivitiesController.js';
import { HealthController } from './interface-adapters/controllers/HealthController.js';
import { StaticController } from './interface-adapters/controllers/StaticController.js';
import { AppRouter } from './interface-adapters/routing/AppRouter.js';

export interface AppContainerOptions {
    /** Defaults to a ConsoleLogger at the configured level. */
    logger?: ILogger;
}

/**
 * Composition root. Owns the registry instance every request works on.
 */
export class AppContainer {
    // Observability
    public logger: ILogger;

    // Infrastructure
    public activityRepository: InMemoryActivityRepository;
    public eventDispatcher: InMemoryEventDispatcher;

    // Use Cases
    public listActivitiesUseCase: ListActivities;
    public signUpUseCase: SignUpForActivity;
    public unregisterUseCase: UnregisterFromActivity;

    // Controllers
    public activitiesController: ActivitiesController;
    public healthController: HealthController;
    public staticController: StaticController;
    public appRouter: AppRouter;

    constructor(
        public readonly config: AppConfig,
        seed: ActivityCatalog,
        options: AppContainerOptions = {}
    ) {
        // 1. Observability (initialized first, used everywhere)
        this.logger = options.logger ?? new ConsoleLogger({ service: 'mergington-activities' }, config.logLevel);

        // 2. Infrastructure
        this.activityRepository = new InMemoryActivityRepository(seed);
        this.eventDispatcher = new InMemoryEventDispatcher();

        // 3. Event handlers
        const rosterAudit = new RosterAuditHandler(this.logger);
        this.eventDispatcher.subscribe('ParticipantSignedUp', rosterAudit);
        this.eventDispatcher.subscribe('ParticipantUnregistered', rosterAudit);

        // 4. Use Cases
        this.listActivitiesUseCase = new ListActivities(this.activityRepository);
        this.signUpUseCase = new SignUpForActivity(this.activityRepository, this.eventDispatcher);
        this.unregisterUseCase = new UnregisterFromActivity(this.activityRepository, this.eventDispatcher);

        // 5. Interface Adapters
        this.activitiesController = new ActivitiesController(
            this.listActivitiesUseCase,
            this.signUpUseCase,
            this.unregisterUseCase
        );
        this.healthController = new HealthController(this.activityRepository, this.eventDispatcher);
        this.staticController = new StaticController(config.staticDir);
        this.appRouter = new AppRouter({
            activitiesController: this.activitiesController,
            healthController: this.healthController,
            staticController: this.staticController,
            logger: this.logger,
        });
    }

    /**
     * Build a container whose registry is seeded from config.seedFile.
     */
    static async create(config: AppConfig, options: AppContainerOptions = {}): Promise<AppContainer> {
        const seed = await loadActivitySeed(config.seedFile);
        return new AppContainer(config, seed, options);
    }
}
