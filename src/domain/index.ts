// Entities
export * from './entities/AlexaEntity.js';
export * from './entities/ApplianceGroup.js';
export * from './entities/Area.js';
export * from './entities/GroupMembership.js';
export * from './entities/Identifiers.js';
export * from './entities/RunContext.js';
export * from './entities/SyncSummary.js';

// Errors
export * from './errors/SyncError.js';

// Ports
export type * from './ports/IAlexaDirectory.js';
export type * from './ports/IClock.js';
export type * from './ports/IDirectoryWriter.js';
export type * from './ports/IHomeAssistantClient.js';
export type * from './ports/ILogger.js';
export type { HttpMethod, ITransport, TransportRequest, TransportResponse } from './ports/ITransport.js';
export { isSuccessStatus } from './ports/ITransport.js';
