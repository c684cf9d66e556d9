import { Logger } from '@nestjs/common';
import {
    OnGatewayConnection,
    OnGatewayDisconnect,
    WebSocketGateway,
    WebSocketServer,
} from '@nestjs/websockets';
import type { Server, Socket } from 'socket.io';
import type { DiagnosticNotification, HeartbeatNotification, SignalNotification } from './dto/notification.dto';

/**
 * Notification channel for the monitor's output. Every connected client gets every
 * event; there are no rooms.
 */
@WebSocketGateway({
    cors: {
        origin: process.env.CORS_ORIGIN || '*',
        credentials: true
    }
})
export class SignalsGateway implements OnGatewayConnection, OnGatewayDisconnect {
    @WebSocketServer() server?: Server;
    private readonly logger = new Logger(SignalsGateway.name);
    private lastSignal?: SignalNotification;

    handleConnection(client: Pick<Socket, 'id' | 'emit'>) {
        this.logger.log(`Client connected: ${client.id}`);
        if (this.lastSignal) {
            client.emit('signal:last', this.lastSignal);
        }
    }

    handleDisconnect(client: Pick<Socket, 'id'>) {
        this.logger.log(`Client disconnected: ${client.id}`);
    }

    broadcastSignal(payload: SignalNotification): void {
        this.lastSignal = payload;
        if (!this.server) return;
        this.server.emit('signal', payload);
    }

    broadcastHeartbeat(payload: HeartbeatNotification): void {
        if (!this.server) return;
        this.server.emit('heartbeat', payload);
    }

    broadcastDiagnostic(payload: DiagnosticNotification): void {
        if (!this.server) return;
        this.server.emit('diagnostic', payload);
    }

    getLastSignal(): SignalNotification | undefined {
        return this.lastSignal;
    }
}
