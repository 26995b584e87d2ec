import { Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { NarrationTranscriber } from './captions/transcription.service';
import { StockFootageService } from './footage/stock-footage.service';
import { RenderService } from './render/render.service';
import { ScriptGenerator } from './script/script-generator.service';
import { SpeechSynthesizer } from './speech/speech.service';
import { ARTIFACT_STORAGE, createArtifactStorage } from './storage/artifact-storage';
import { VideoPipeline } from './video-pipeline.service';

@Module({
  providers: [
    ScriptGenerator,
    SpeechSynthesizer,
    StockFootageService,
    RenderService,
    NarrationTranscriber,
    {
      provide: ARTIFACT_STORAGE,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => createArtifactStorage(config),
    },
    VideoPipeline,
  ],
  exports: [VideoPipeline],
})
export class PipelineModule {}
