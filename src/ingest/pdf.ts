import * as pdfjsLib from "pdfjs-dist";

/**
 * Extracts the text layer of a PDF. Text items on a page are joined by single
 * spaces and pages are separated by a blank line. Scanned pages without a
 * text layer come back empty.
 */
export async function extractPdfText(data: Uint8Array): Promise<string> {
    const loadingTask = pdfjsLib.getDocument({
        data,
        disableFontFace: true,
        isEvalSupported: false,
        verbosity: pdfjsLib.VerbosityLevel.ERRORS,
    });

    try {
        const pdfDocument = await loadingTask.promise;

        const pageTexts: string[] = [];
        for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
            const page = await pdfDocument.getPage(pageNum);
            const textContent = await page.getTextContent();
            const pageText = textContent.items
                .map((item) => ("str" in item ? item.str : ""))
                .join(" ")
                .replace(/\s+/g, " ")
                .trim();
            pageTexts.push(pageText);
        }

        return pageTexts.filter((text) => text.length > 0).join("\n\n");
    } finally {
        await loadingTask.destroy();
    }
}
