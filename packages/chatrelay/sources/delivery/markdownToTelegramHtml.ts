import { Lexer, type Token, type Tokens } from "marked";

/**
 * Rewrites model markdown into the HTML subset Telegram accepts
 * (b, i, s, code, pre, a, blockquote). Headings become bold lines,
 * list markers become bullets and tables stay as pipe text.
 */
export function markdownToTelegramHtml(markdown: string): string {
    const tokens = new Lexer({ gfm: true }).lex(markdown);
    return blocksRender(tokens).replace(/\n+$/, "");
}

export function htmlEscape(text: string): string {
    return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

const ENTITIES: Record<string, string> = {
    "&amp;": "&",
    "&lt;": "<",
    "&gt;": ">",
    "&quot;": '"',
    "&#39;": "'"
};

// Some marked releases pre-escape text and codespan tokens; decode first so nothing is escaped twice.
function textEscape(text: string): string {
    return htmlEscape(text.replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity));
}

function blocksRender(tokens: Token[]): string {
    return tokens.map(blockRender).join("");
}

function blockRender(token: Token): string {
    switch (token.type) {
        case "paragraph":
            return `${inlineRender((token as Tokens.Paragraph).tokens)}\n`;
        case "heading":
            return `<b>${inlineRender((token as Tokens.Heading).tokens)}</b>\n`;
        case "code": {
            const code = token as Tokens.Code;
            const body = textEscape(code.text);
            return code.lang
                ? `<pre><code class="language-${htmlEscape(code.lang)}">${body}</code></pre>\n`
                : `<pre>${body}</pre>\n`;
        }
        case "blockquote":
            return `<blockquote>${blocksRender((token as Tokens.Blockquote).tokens).trim()}</blockquote>\n`;
        case "list":
            return listRender(token as Tokens.List);
        case "table":
            return tableRender(token as Tokens.Table);
        case "space":
            return "\n";
        case "hr":
            return "---\n";
        case "text": {
            const text = token as Tokens.Text;
            return text.tokens ? inlineRender(text.tokens) : textEscape(text.text);
        }
        default:
            return "raw" in token && typeof token.raw === "string" ? htmlEscape(token.raw) : "";
    }
}

function inlineRender(tokens: Token[] | undefined): string {
    return (tokens ?? []).map(inlineTokenRender).join("");
}

function inlineTokenRender(token: Token): string {
    switch (token.type) {
        case "strong":
            return `<b>${inlineRender((token as Tokens.Strong).tokens)}</b>`;
        case "em":
            return `<i>${inlineRender((token as Tokens.Em).tokens)}</i>`;
        case "del":
            return `<s>${inlineRender((token as Tokens.Del).tokens)}</s>`;
        case "codespan":
            return `<code>${textEscape((token as Tokens.Codespan).text)}</code>`;
        case "link": {
            const link = token as Tokens.Link;
            return `<a href="${textEscape(link.href).replace(/"/g, "&quot;")}">${inlineRender(link.tokens)}</a>`;
        }
        case "br":
            return "\n";
        case "escape":
            return textEscape((token as Tokens.Escape).text);
        case "text": {
            const text = token as Tokens.Text;
            return text.tokens ? inlineRender(text.tokens) : textEscape(text.text);
        }
        default:
            return "raw" in token && typeof token.raw === "string" ? htmlEscape(token.raw) : "";
    }
}

function listRender(list: Tokens.List): string {
    const start = typeof list.start === "number" ? list.start : 1;
    const items = list.items.map((item, index) => {
        const marker = list.ordered ? `${start + index}. ` : "• ";
        const checkbox = item.checked === true ? "☑ " : item.checked === false ? "☐ " : "";
        const content = item.tokens
            .filter((child) => child.type !== "checkbox")
            .map((child) => (child.type === "paragraph" ? inlineRender((child as Tokens.Paragraph).tokens) : blockRender(child)))
            .join("")
            .trim();
        return `${marker}${checkbox}${content}`;
    });
    return `${items.join("\n")}\n`;
}

function tableRender(table: Tokens.Table): string {
    const rowRender = (cells: Tokens.TableCell[]) => `| ${cells.map((cell) => inlineRender(cell.tokens)).join(" | ")} |`;
    const rows = [
        rowRender(table.header),
        `| ${table.header.map(() => "---").join(" | ")} |`,
        ...table.rows.map(rowRender)
    ];
    return `${rows.join("\n")}\n`;
}
