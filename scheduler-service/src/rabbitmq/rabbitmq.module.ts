import { Module } from "@nestjs/common";
import { AutomationGateway } from "../automation/automation.gateway";
import { RmqAutomationGateway } from "../automation/rmq-automation.gateway";
import { EngineEventPublisher } from "../engine/engine-events";
import { RabbitMQService } from "./rabbitmq.service";

@Module({
  providers: [
    RabbitMQService,
    { provide: EngineEventPublisher, useExisting: RabbitMQService },
    { provide: AutomationGateway, useClass: RmqAutomationGateway },
  ],
  exports: [EngineEventPublisher, AutomationGateway],
})
export class RabbitMQModule {}
