export interface MessagingService {
	publish<T>(exchange: string, routingKey: string, message: T): Promise<void>;
}
