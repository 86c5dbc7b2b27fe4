import { IsOptional, IsString, MaxLength } from 'class-validator';
import { MAX_MESSAGE_LENGTH, MAX_MODE_LABEL_LENGTH } from '../constants/chat.constants';

export class SendMessageDto {
    @IsString()
    @MaxLength(MAX_MESSAGE_LENGTH)
    message!: string;

    /** Free-form label; unrecognized values fall back to chat mode */
    @IsOptional()
    @IsString()
    @MaxLength(MAX_MODE_LABEL_LENGTH)
    mode?: string;
}
