export enum FailureKind {
    VALIDATION = 'validation',
    TRANSPORT = 'transport',
    RESOURCE_LIMIT = 'resource-limit',
    UNEXPECTED = 'unexpected',
}
