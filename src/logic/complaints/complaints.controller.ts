import { Body, Controller, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ComplaintsService } from './complaints.service';
import { SubmitComplaintDto } from './dto/submit-complaint.dto';

@Controller('complaints')
export class ComplaintsController {
  constructor(private readonly complaintsService: ComplaintsService) {}

  @Post(':sessionId')
  @HttpCode(HttpStatus.OK)
  async submit(@Param('sessionId') sessionId: string, @Body() body: SubmitComplaintDto) {
    return this.complaintsService.submit(sessionId, body);
  }
}
