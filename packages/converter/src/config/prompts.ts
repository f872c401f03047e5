/**
 * Instruction sent with every page image
 */
export const TRANSCRIPTION_PROMPT = `
Please read the content in the image and transcribe it into plain Markdown format. Please note:
1. Maintain the format of headings, text, formulas, and table rows and columns
2. Mathematical formulas should be transcribed using LaTeX syntax, ensuring consistency with the original
3. No additional explanation is needed, and no content outside the original text should be added.
`;
