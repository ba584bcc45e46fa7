export const DEFAULT_SEGMENT_MAX_LENGTH = 4000;

/**
 * Lazily splits a reply into segments of at most maxLength characters.
 * Lines are packed greedily; an overlong line is packed word by word and a word longer
 * than the limit is cut. Line breaks and spaces at segment boundaries are dropped.
 * Expects: maxLength > 0.
 */
export function* replySegments(text: string, maxLength: number = DEFAULT_SEGMENT_MAX_LENGTH): Generator<string> {
    if (maxLength <= 0) {
        throw new Error("maxLength must be greater than 0");
    }
    if (text.length <= maxLength) {
        yield text;
        return;
    }

    let buffer = "";
    for (const line of text.split("\n")) {
        const joined = buffer.length > 0 ? `${buffer}\n${line}` : line;
        if (joined.length <= maxLength) {
            buffer = joined;
            continue;
        }
        if (buffer.length > 0) {
            yield buffer;
            buffer = "";
        }
        if (line.length <= maxLength) {
            buffer = line;
            continue;
        }
        // The tail of an overlong line stays buffered so following lines can join it.
        for (const piece of lineSplit(line, maxLength)) {
            if (buffer.length > 0) {
                yield buffer;
            }
            buffer = piece;
        }
    }
    if (buffer.length > 0) {
        yield buffer;
    }
}

function* lineSplit(line: string, maxLength: number): Generator<string> {
    let buffer = "";
    for (const word of line.split(" ")) {
        const joined = buffer.length > 0 ? `${buffer} ${word}` : word;
        if (joined.length <= maxLength) {
            buffer = joined;
            continue;
        }
        if (buffer.length > 0) {
            yield buffer;
            buffer = "";
        }
        let rest = word;
        while (rest.length > maxLength) {
            yield rest.slice(0, maxLength);
            rest = rest.slice(maxLength);
        }
        buffer = rest;
    }
    if (buffer.length > 0) {
        yield buffer;
    }
}
