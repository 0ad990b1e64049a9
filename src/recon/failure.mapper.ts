import {
    BadGatewayException,
    BadRequestException,
    HttpException,
    InternalServerErrorException,
} from '@nestjs/common';
import { FailureKind } from '../enums/failure-kind.enum';
import { Failure } from '../interfaces/fetch.interface';

export function toHttpException(failure: Failure): HttpException {
    switch (failure.kind) {
        case FailureKind.VALIDATION:
            return new BadRequestException(failure.error);
        case FailureKind.TRANSPORT:
        case FailureKind.RESOURCE_LIMIT:
            return new BadGatewayException(failure.error);
        case FailureKind.UNEXPECTED:
            return new InternalServerErrorException(failure.error);
    }
}

/** Returns the success branch of a report, or throws the matching HTTP exception. */
export function unwrapReport<T extends { ok: true }>(report: T | Failure): T {
    if (!report.ok) {
        throw toHttpException(report);
    }
    return report;
}
