// Domain Layer - Exports
export * from './domain/entities/Activity.js';
export * from './domain/errors/RegistrationErrors.js';
export * from './domain/events/IDomainEvent.js';
export * from './domain/events/RosterChanged.js';
export * from './domain/events/ParticipantSignedUp.js';
export * from './domain/events/ParticipantUnregistered.js';

// Application Layer - Exports
export * from './application/ports/IActivityRepository.js';
export * from './application/ports/IEventDispatcher.js';
export * from './application/use-cases/implementation/ListActivities.js';
export * from './application/use-cases/implementation/SignUpForActivity.js';
export * from './application/use-cases/implementation/UnregisterFromActivity.js';
export * from './application/handlers/RosterAuditHandler.js';

// Infrastructure Layer - Exports
export * from './infrastructure/config/AppConfig.js';
export * from './infrastructure/messaging/InMemoryEventDispatcher.js';
export * from './infrastructure/persistence/in-memory/InMemoryActivityRepository.js';
export * from './infrastructure/persistence/seed/ActivitySeedLoader.js';
export * from './infrastructure/observability/Logger.js';
export * from './infrastructure/observability/RequestContext.js';
export * from './infrastructure/observability/CorrelationMiddleware.js';

// Interface Adapters
export * from './interface-adapters/routing/Router.js';
export * from './interface-adapters/routing/AppRouter.js';
export * from './interface-adapters/controllers/ActivitiesController.js';
export * from './interface-adapters/controllers/HealthController.js';
export * from './interface-adapters/controllers/StaticController.js';

// Shared
export * from './shared/errors/ErrorCodes.js';
export * from './shared/errors/ApiError.js';
export * from './shared/errors/ErrorNormalizer.js';
export * from './shared/validation/index.js';
export * from './shared/utils/IdGenerator.js';

// Composition
export * from './AppContainer.js';
