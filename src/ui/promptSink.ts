import type { LogLevel } from '../diagnostics/logger';

export type PromptLevel = Extract<LogLevel, 'info' | 'warn' | 'error'>;

/**
 * Operator-facing instructions. At most one prompt is visible; showing a new
 * one replaces the previous.
 */
export interface PromptSink {
	show(level: PromptLevel, title: string, text: string): void;
	hide(): void;
}

export class NoopPromptSink implements PromptSink {
	public show(_level: PromptLevel, _title: string, _text: string): void {}
	public hide(): void {}
}

/**
 * Renders prompts as framed text blocks, skipping repeats of the visible prompt.
 */
export class ConsolePromptSink implements PromptSink {
	private readonly write: (text: string) => void;
	private visible?: string;

	public constructor(write: (text: string) => void) {
		this.write = write;
	}

	public show(level: PromptLevel, title: string, text: string): void {
		const key = `${level}\u0000${title}\u0000${text}`;
		if (this.visible === key) {
			return;
		}
		this.visible = key;

		const heading = `== ${title} [${level.toUpperCase()}] ==`;
		const body = text.split('\n').map((line) => `   ${line}`);
		this.write([heading, ...body, ''].join('\n'));
	}

	public hide(): void {
		this.visible = undefined;
	}
}
