/**
 * Builds the text part sent alongside a stored image for a follow-up question.
 */
export function imageFollowUpPromptBuild(descriptor: string, question: string): string {
    return [
        `Earlier the user shared this image with the caption: "${descriptor}".`,
        `Answer their follow-up question about the image: ${question}`
    ].join("\n");
}
