import type { Refund } from "@/domain/entities/Refund";
import { NotFoundError } from "@/domain/errors/DomainError";
import type { RefundRepository } from "@/domain/repositories/RefundRepository";
import type { TransactionManager } from "../ports/TransactionManager";

export class GetRefundByIdUseCase {
	constructor(
		private readonly refundRepository: RefundRepository,
		private readonly transactionManager: TransactionManager
	) {}

	async execute(storeId: string, refundId: string): Promise<Refund> {
		const refund = await this.transactionManager.runInSession(async () => {
			return this.refundRepository.findById(storeId, refundId);
		});

		if (!refund) {
			throw new NotFoundError("Refund", refundId);
		}

		return refund;
	}
}
