import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  StreamableFile,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiProduces, ApiTags } from '@nestjs/swagger';
import { createReadStream } from 'fs';
import { GenerateVideoDto } from './dto/generate-video.dto';
import { JobView, downloadUrl, statusUrl, toJobView } from './job.presenter';
import { JobsService } from './jobs.service';

@ApiTags('jobs')
@Controller()
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  @Post('generate-video')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Start generating a short video from a topic' })
  @ApiBody({ type: GenerateVideoDto })
  async create(@Body() body: unknown) {
    const job = await this.jobsService.submit(body);
    return {
      job_id: job.id,
      status: job.status,
      message: 'Video generation started',
      check_status_url: statusUrl(job.id),
      download_url: downloadUrl(job.id),
    };
  }

  @Get('job-status/:jobId')
  @ApiOperation({ summary: 'Get job status and progress' })
  async status(@Param('jobId') jobId: string): Promise<JobView> {
    return toJobView(await this.jobsService.getStatus(jobId));
  }

  @Get('download-video/:jobId')
  @ApiOperation({ summary: 'Download the finished video, or get its storage URL' })
  @ApiProduces('video/mp4', 'application/json')
  async download(@Param('jobId') jobId: string) {
    const artifact = await this.jobsService.getResult(jobId);
    if (artifact.kind === 'url') {
      return {
        job_id: jobId,
        video_url: artifact.url,
        download_url: artifact.url,
        message: 'Video is available at the provided URL',
      };
    }
    return new StreamableFile(createReadStream(artifact.path), {
      type: 'video/mp4',
      disposition: `attachment; filename="${artifact.filename}"`,
    });
  }

  @Get('jobs')
  @ApiOperation({ summary: 'List all jobs' })
  async findAll(): Promise<{ jobs: JobView[]; total: number }> {
    const jobs = await this.jobsService.list();
    return { jobs: jobs.map(toJobView), total: jobs.length };
  }

  @Delete('cleanup/:jobId')
  @ApiOperation({ summary: 'Remove a job and its local video, cancelling it if still running' })
  async cleanup(@Param('jobId') jobId: string): Promise<{ message: string }> {
    await this.jobsService.cleanup(jobId);
    return { message: 'Job cleaned up successfully' };
  }
}
