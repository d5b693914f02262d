/**
 * 输出端：渲染器只需要“写入”和“刷新”两个能力。
 */
export interface OutputSink {
	write(data: string): void;
	flush(): void;
}

/** 可写流的最小形状（process.stdout、PassThrough 等） */
export interface WritableLike {
	write(chunk: string): boolean;
}

/**
 * 包装可写流的输出端。
 * write() 只在内存中累积，flush() 时一次性写入流，避免一帧被拆成多次系统调用。
 */
export class StreamOutputSink implements OutputSink {
	private pending = "";

	constructor(private readonly stream: WritableLike = process.stdout) {}

	write(data: string): void {
		this.pending += data;
	}

	flush(): void {
		if (this.pending.length === 0) return;
		const data = this.pending;
		this.pending = "";
		this.stream.write(data);
	}
}

/**
 * 内存输出端，用于测试：记录每次 flush 的内容。
 */
export class MemoryOutputSink implements OutputSink {
	private pending = "";
	/** 每次 flush 写出的数据块（不含空 flush） */
	readonly chunks: string[] = [];
	flushCount = 0;

	write(data: string): void {
		this.pending += data;
	}

	flush(): void {
		this.flushCount++;
		if (this.pending.length === 0) return;
		this.chunks.push(this.pending);
		this.pending = "";
	}

	/** 所有已刷新的输出 */
	get output(): string {
		return this.chunks.join("");
	}

	/** 取出自上次调用以来已刷新的输出 */
	take(): string {
		const data = this.chunks.join("");
		this.chunks.length = 0;
		return data;
	}
}
