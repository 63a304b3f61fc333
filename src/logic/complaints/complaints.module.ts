import { Module } from '@nestjs/common';
import { ComplaintsService } from './complaints.service';
import { ComplaintsController } from './complaints.controller';
import { SessionModule } from '../session/session.module';

@Module({
    imports: [SessionModule],
    controllers: [ComplaintsController],
    providers: [ComplaintsService],
    exports: [ComplaintsService],
})
export class ComplaintsModule {}
