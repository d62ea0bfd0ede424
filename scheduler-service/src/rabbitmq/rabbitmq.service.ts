import { Injectable, OnApplicationShutdown, Logger } from "@nestjs/common";
import {
  ClientProxy,
  ClientProxyFactory,
  Transport,
} from "@nestjs/microservices";
import { lastValueFrom, timeout } from "rxjs";
import { ConfigService } from "../config/config.service";
import { errorMessage } from "../common/errors";
import { EngineEvent, EngineEventPublisher } from "../engine/engine-events";
import { withExponentialBackoff } from "../utils/exponential-backoff";

@Injectable()
export class RabbitMQService extends EngineEventPublisher implements OnApplicationShutdown {
  private readonly logger = new Logger(RabbitMQService.name);
  private readonly eventsClient: ClientProxy;
  private readonly automationClient: ClientProxy;

  constructor(private readonly configService: ConfigService) {
    super();
    this.eventsClient = this.createClient(this.configService.eventsQueue);
    this.automationClient = this.createClient(this.configService.automationQueue);

    for (const [name, client] of [
      ["events", this.eventsClient],
      ["automation", this.automationClient],
    ] as const) {
      withExponentialBackoff(
        () => client.connect(),
        {
          maxRetries: 5,
          initialDelayMs: 2000,
          shouldRetry: (error: unknown) => !errorMessage(error).includes("ACCESS_REFUSED"),
        },
        `RabbitMQ ${name} client connection`
      ).catch((error) => {
        this.logger.error(`Failed to connect RabbitMQ ${name} client after retries: ${errorMessage(error)}`);
      });
    }

    this.logger.log(
      `RabbitMQ clients initialized for URL: ${this.configService.rabbitmqUrlForLogging}`
    );
    this.logger.log(
      `Publishing events to ${this.configService.eventsQueue}, automation requests to ${this.configService.automationQueue}`
    );
  }

  private createClient(queue: string): ClientProxy {
    return ClientProxyFactory.create({
      transport: Transport.RMQ,
      options: {
        urls: [this.configService.rabbitmqUrl],
        queue,
        queueOptions: {
          durable: true,
        },
        socketOptions: {
          heartbeatIntervalInSeconds: 60,
          reconnectTimeInSeconds: 5,
        },
      },
    });
  }

  async onApplicationShutdown() {
    for (const client of [this.eventsClient, this.automationClient]) {
      try {
        await client.close();
      } catch (error) {
        this.logger.error(`Error closing RabbitMQ client connection: ${errorMessage(error)}`);
      }
    }
    this.logger.log("RabbitMQ client connections closed");
  }

  /**
   * Lifecycle events are best-effort: a broker outage is logged after the
   * retries run out and never fails the job transition that raised it.
   */
  async publish(event: EngineEvent): Promise<void> {
    try {
      await withExponentialBackoff(
        async () => {
          await this.eventsClient.connect();
          await lastValueFrom(this.eventsClient.emit(event.pattern, event), {
            defaultValue: undefined,
          });
        },
        {
          maxRetries: 3,
          initialDelayMs: 1000,
          shouldRetry: (error: unknown) => !errorMessage(error).includes("validation"),
        },
        `Publishing ${event.pattern} for campaign ${event.campaignId}`
      );
    } catch (error) {
      this.logger.error(`Dropped ${event.pattern} event: ${errorMessage(error)}`, {
        campaignId: event.campaignId,
        jobId: event.jobId,
      });
    }
  }

  /** Request/response over the automation queue. Resolves with the raw reply. */
  async request(pattern: string, payload: object, timeoutMs: number): Promise<unknown> {
    await this.automationClient.connect();
    return lastValueFrom(
      this.automationClient.send<unknown, object>(pattern, payload).pipe(timeout(timeoutMs))
    );
  }
}
