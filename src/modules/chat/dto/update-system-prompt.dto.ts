import { IsIn, IsString, MaxLength } from 'class-validator';
import { MAX_PROMPT_LENGTH } from '../constants/chat.constants';
import { CHAT_MODES, type ChatMode } from '../modes/mode.config';

/**
 * DTO for overriding one mode's system prompt in a session
 */
export class UpdateSystemPromptDto {
    @IsIn([...CHAT_MODES], {
        message: `mode must be one of: ${CHAT_MODES.join(', ')}`,
    })
    mode!: ChatMode;

    @IsString()
    @MaxLength(MAX_PROMPT_LENGTH)
    prompt!: string;
}
