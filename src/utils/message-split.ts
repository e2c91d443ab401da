export const MAX_MESSAGE_LENGTH = 4096;

const sliceLongLine = (line: string, maxLength: number): string[] => {
  const slices: string[] = [];
  for (let start = 0; start < line.length; start += maxLength) {
    slices.push(line.slice(start, start + maxLength));
  }
  return slices;
};

const packPieces = (pieces: string[], separator: string, maxLength: number): string[] => {
  const chunks: string[] = [];
  let current = '';
  for (const piece of pieces) {
    if (!current) {
      current = piece;
    } else if (current.length + separator.length + piece.length > maxLength) {
      chunks.push(current);
      current = piece;
    } else {
      current += separator + piece;
    }
  }
  if (current.trim()) {
    chunks.push(current);
  }
  return chunks;
};

/**
 * Splits a message into chat-sized chunks, preferring paragraph breaks, then
 * line breaks. A single line longer than the limit is cut where it overflows.
 */
export const splitMessage = (text: string, maxLength: number = MAX_MESSAGE_LENGTH): string[] => {
  if (text.length <= maxLength) {
    return [text];
  }

  const paragraphs = text.split('\n\n').flatMap((paragraph) => {
    if (paragraph.length <= maxLength) {
      return [paragraph];
    }
    const lines = paragraph.split('\n').flatMap((line) => (line.length > maxLength ? sliceLongLine(line, maxLength) : [line]));
    return packPieces(lines, '\n', maxLength);
  });

  return packPieces(paragraphs, '\n\n', maxLength);
};
