/**
 * RESPONSIBILITY: Typed error taxonomy of the engine.
 * Each component throws its own subclass; `kind` discriminates the failure and
 * `details` carries structured context for the caller to present.
 */

export type EngineComponent =
    | 'GeometryExtractor'
    | 'HoleCollection'
    | 'GridNumberer'
    | 'SectorPartitioner'
    | 'SectorProgressTracker'
    | 'PathPlanner'
    | 'InspectionSession'
    | 'Config';

export type ErrorDetails = Readonly<Record<string, unknown>>;

export class EngineError<K extends string = string> extends Error {
    constructor(
        public readonly component: EngineComponent,
        public readonly kind: K,
        message: string,
        public readonly details: ErrorDetails = {}
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export type GeometryErrorKind = 'AmbiguousMatch' | 'EmptyResult';
export class GeometryError extends EngineError<GeometryErrorKind> {
    constructor(kind: GeometryErrorKind, message: string, details?: ErrorDetails) {
        super('GeometryExtractor', kind, message, details);
    }
}

export type CollectionErrorKind = 'DuplicateId';
export class CollectionError extends EngineError<CollectionErrorKind> {
    constructor(kind: CollectionErrorKind, message: string, details?: ErrorDetails) {
        super('HoleCollection', kind, message, details);
    }
}

export type NumberingErrorKind = 'DegenerateGrid' | 'CellCollision';
export class NumberingError extends EngineError<NumberingErrorKind> {
    constructor(kind: NumberingErrorKind, message: string, details?: ErrorDetails) {
        super('GridNumberer', kind, message, details);
    }
}

export type PartitionErrorKind = 'InvalidSectorCount';
export class PartitionError extends EngineError<PartitionErrorKind> {
    constructor(kind: PartitionErrorKind, message: string, details?: ErrorDetails) {
        super('SectorPartitioner', kind, message, details);
    }
}

export type ProgressErrorKind = 'UnknownHole' | 'UnknownSector' | 'UnpartitionedHole';
export class ProgressError extends EngineError<ProgressErrorKind> {
    constructor(kind: ProgressErrorKind, message: string, details?: ErrorDetails) {
        super('SectorProgressTracker', kind, message, details);
    }
}

export type PathErrorKind = 'EmptyInput' | 'UnnumberedHole';
export class PathError extends EngineError<PathErrorKind> {
    constructor(kind: PathErrorKind, message: string, details?: ErrorDetails) {
        super('PathPlanner', kind, message, details);
    }
}

export type StatusErrorKind = 'IllegalTransition' | 'UnknownHole';
export class StatusError extends EngineError<StatusErrorKind> {
    constructor(kind: StatusErrorKind, message: string, details?: ErrorDetails) {
        super('InspectionSession', kind, message, details);
    }
}

export type ConfigErrorKind = 'InvalidValue';
export class ConfigError extends EngineError<ConfigErrorKind> {
    constructor(kind: ConfigErrorKind, message: string, details?: ErrorDetails) {
        super('Config', kind, message, details);
    }
}

export const isEngineError = (error: unknown): error is EngineError => error instanceof EngineError;
