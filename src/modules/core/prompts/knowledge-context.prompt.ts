// Knowledge Context Prompt
// Wraps an external summary so the model treats it as citable context for one turn

export interface KnowledgeSource {
    source: string;
    summary: string;
}

// Formats an external summary as a delimited source block
export function formatSourceBlock({ source, summary }: KnowledgeSource): string {
    return `\n[External Source: ${source}]\n${summary.trim()}\n[End Source]\n`;
}

// Generates the system message instructing the model to use the source block
export function getKnowledgeContextPrompt(sourceBlock: string): string {
    return `Use the following external context to answer. Cite it naturally when used.\n${sourceBlock}`;
}
