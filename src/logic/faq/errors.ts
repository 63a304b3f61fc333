import { HttpException, HttpStatus } from '@nestjs/common';

export class FaqSchemaError extends HttpException {
    constructor(public readonly columns: string[]) {
        super({
            statusCode: HttpStatus.BAD_GATEWAY,
            error: 'FAQ schema error',
            message: `❌ Required columns not found. Columns: ${JSON.stringify(columns)}`,
            columns,
        }, HttpStatus.BAD_GATEWAY);
    }
}

export class FaqFetchError extends HttpException {
    constructor(public readonly reason: string) {
        super({
            statusCode: HttpStatus.BAD_GATEWAY,
            error: 'FAQ fetch error',
            message: `❌ Failed to load FAQ spreadsheet: ${reason}`,
        }, HttpStatus.BAD_GATEWAY);
    }
}
