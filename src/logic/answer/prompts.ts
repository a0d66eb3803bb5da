export const GENERATION_ERROR_PREFIX = 'Erreur lors de la génération';

export function buildAnswerPrompt(question: string, context: string): string {
    return `Tu es un assistant intelligent qui répond aux questions en te basant sur des dialogues de conversations téléphoniques.

Contexte (extraits de dialogues):
${context}

Question: ${question}

Réponds de manière claire et concise en français, en t'appuyant uniquement sur les informations contenues dans les dialogues. Si les dialogues ne contiennent pas d'information pertinente, dis-le clairement.`;
}
