import {
    Body,
    Controller,
    Delete,
    Get,
    Param,
    ParseUUIDPipe,
    Post,
    Put,
} from '@nestjs/common';
import { ChatSessionService } from './chat-session.service';
import { ChatReplyDto, SessionResponseDto } from './dto/chat-response.dto';
import { SendMessageDto } from './dto/send-message.dto';
import { UpdateSystemPromptDto } from './dto/update-system-prompt.dto';
import { CHAT_MODES, DEFAULT_MODE } from './modes/mode.config';

@Controller('chat')
export class ChatController {
    constructor(private chatSessionService: ChatSessionService) { }

    @Get('modes')
    getModes() {
        return { modes: CHAT_MODES, defaultMode: DEFAULT_MODE };
    }

    @Post('sessions')
    createSession(): SessionResponseDto {
        return new SessionResponseDto(this.chatSessionService.createSession());
    }

    @Get('sessions')
    listSessions(): SessionResponseDto[] {
        return this.chatSessionService.listSessions().map((info) => new SessionResponseDto(info));
    }

    @Get('sessions/:id')
    getSession(@Param('id', ParseUUIDPipe) id: string): SessionResponseDto {
        return new SessionResponseDto(this.chatSessionService.getSession(id), {
            messages: this.chatSessionService.getHistory(id),
            systemPrompts: this.chatSessionService.getSystemPrompts(id),
        });
    }

    @Delete('sessions/:id')
    deleteSession(@Param('id', ParseUUIDPipe) id: string) {
        this.chatSessionService.deleteSession(id);
        return { message: 'Chat session deleted' };
    }

    @Post('sessions/:id/messages')
    async sendMessage(
        @Param('id', ParseUUIDPipe) id: string,
        @Body() dto: SendMessageDto,
    ): Promise<ChatReplyDto> {
        const result = await this.chatSessionService.sendMessage(id, dto.message, dto.mode);
        return new ChatReplyDto(result);
    }

    @Get('sessions/:id/history')
    getHistory(@Param('id', ParseUUIDPipe) id: string) {
        return { messages: this.chatSessionService.getHistory(id) };
    }

    @Delete('sessions/:id/history')
    resetHistory(@Param('id', ParseUUIDPipe) id: string) {
        this.chatSessionService.resetHistory(id);
        return { message: 'Chat history reset' };
    }

    @Get('sessions/:id/system-prompts')
    getSystemPrompts(@Param('id', ParseUUIDPipe) id: string) {
        return { prompts: this.chatSessionService.getSystemPrompts(id) };
    }

    @Put('sessions/:id/system-prompts')
    updateSystemPrompt(
        @Param('id', ParseUUIDPipe) id: string,
        @Body() dto: UpdateSystemPromptDto,
    ) {
        return { prompts: this.chatSessionService.setSystemPrompt(id, dto.mode, dto.prompt) };
    }
}
