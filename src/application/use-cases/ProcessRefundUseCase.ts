import type { Refund } from "@/domain/entities/Refund";
import { NotFoundError } from "@/domain/errors/DomainError";
import type { RefundRepository } from "@/domain/repositories/RefundRepository";
import type { TransactionManager } from "../ports/TransactionManager";
import type { OutboxEventRecorder } from "../services/OutboxEventRecorder";

export class ProcessRefundUseCase {
	constructor(
		private readonly refundRepository: RefundRepository,
		private readonly transactionManager: TransactionManager,
		private readonly outboxEventRecorder: OutboxEventRecorder
	) {}

	async execute(
		storeId: string,
		refundId: string,
		processedAmount: number,
		notes?: string | null
	): Promise<Refund> {
		return this.transactionManager.runInTransaction(async () => {
			// The row lock makes a concurrent second call see PROCESSED.
			const refund = await this.refundRepository.findById(storeId, refundId, {
				forUpdate: true,
			});
			if (!refund) {
				throw new NotFoundError("Refund", refundId);
			}

			refund.process(processedAmount, notes);

			await this.refundRepository.save(refund);
			await this.outboxEventRecorder.record(refund.pullDomainEvents());
			return refund;
		});
	}
}
