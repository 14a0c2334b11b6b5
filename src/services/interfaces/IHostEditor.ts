/**
 * @fileoverview Host-side collaborators
 * @module services/interfaces/IHostEditor
 *
 * The editor supplies selections and performs insertions; the status service
 * renders notices and panels. Both are implemented by the host integration.
 */

/**
 * Host editor selection/insertion API
 */
export interface IHostEditor {
    /** Selected text, '' when nothing is selected */
    getSelectedText(): string;

    /** Delete the current selection (used by cut) */
    deleteSelection(): void;

    /**
     * Insert text at the cursor
     * @param options.indent - use the host's indent-aware paste
     */
    insertText(text: string, options: { indent: boolean }): void;
}

/**
 * User notifications and output panels
 */
export interface IStatusService {
    info(message: string): void;
    success(message: string): void;
    warning(message: string): void;
    error(message: string): void;

    /** Show preformatted content in an output panel */
    showPanel(content: string): void;
}
