import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';
import { VOICE_NAMES, isVoiceName } from '../../pipeline/speech/voices';

export const generateVideoSchema = z.object(
  {
    text: z
      .string({
        required_error: 'Missing required field: text',
        invalid_type_error: 'Field "text" must be a string',
      })
      .trim()
      .min(1, 'Field "text" must not be empty'),
    voice: z
      .string()
      .refine(isVoiceName, { message: `Unknown voice. Use one of: ${VOICE_NAMES.join(', ')}` })
      .nullish(),
  },
  { required_error: 'Missing required field: text', invalid_type_error: 'Request body must be a JSON object' },
);

export type GenerateVideoInput = z.infer<typeof generateVideoSchema>;

export class GenerateVideoDto {
  @ApiProperty({ example: 'Amazing facts about dolphins' })
  text!: string;

  @ApiPropertyOptional({ enum: VOICE_NAMES, example: 'adam' })
  voice?: string;
}
