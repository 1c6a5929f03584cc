import { Controller, Query, Sse } from "@nestjs/common";
import { ApiOperation, ApiQuery, ApiTags } from "@nestjs/swagger";
import { map, type Observable } from "rxjs";
import {
	type LedgerSse,
	ServerSentEventsService,
	type SseEvent,
} from "../common/server-sent-events.service";

@ApiTags("5 - Activity")
@Controller("api/v1/ledger")
export class LedgerEventsController {
	constructor(private readonly sseService: ServerSentEventsService) {}

	@Sse("events")
	@ApiOperation({ summary: "Stream of committed ledger operations" })
	@ApiQuery({
		name: "protocolId",
		required: false,
		description: "Only events of this protocol",
	})
	events(
		@Query("protocolId") protocolId?: string,
	): Observable<SseEvent<LedgerSse>> {
		return this.sseService
			.ledgerEvents(protocolId)
			.pipe(map((event) => ({ data: event })));
	}
}
