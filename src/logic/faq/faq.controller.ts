import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { FaqService } from './faq.service';

@Controller('faq')
export class FaqController {
    constructor(private readonly faqService: FaqService) {}

    @Get()
    async getDocuments() {
        const snapshot = await this.faqService.loadDocuments();
        return {
            loadedAt: new Date(snapshot.loadedAt).toISOString(),
            columns: snapshot.columns,
            count: snapshot.documents.length,
            documents: snapshot.documents,
        };
    }

    @Post('refresh')
    @HttpCode(HttpStatus.OK)
    async refresh() {
        this.faqService.invalidate();
        return this.getDocuments();
    }
}
