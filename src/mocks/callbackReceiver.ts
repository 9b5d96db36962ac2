import express from 'express';
import { Logger } from '../services/Logger';
import { SIGNATURE_HEADER, verify } from '../services/SignatureCodec';
import { DELIVERY_ID_HEADER } from '../services/CallbackDeliveryClient';

const logger = Logger.create('callback-receiver-mock', { level: process.env.LOG_LEVEL });

export interface ReceivedCallback {
  deliveryId?: string;
  signatureValid: boolean;
  rawBody: string;
  body: unknown;
  receivedAt: Date;
}

export interface CallbackReceiverOptions {
  status?: number;
}

export interface CallbackReceiver {
  app: express.Application;
  received: ReceivedCallback[];
  setStatus(status: number): void;
}

function parseBody(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Stand-in for a caller's callback endpoint. Checks the signature over the
 * raw bytes and answers 401 when it does not match; otherwise answers with
 * the configured status. Every request is recorded, valid or not.
 */
export function createCallbackReceiverApp(secret: string, options: CallbackReceiverOptions = {}): CallbackReceiver {
  const app = express();
  const received: ReceivedCallback[] = [];
  let status = options.status ?? 200;

  app.post('/callback', express.raw({ type: '*/*' }), (req, res) => {
    const raw = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const signatureValid = verify(secret, raw, req.get(SIGNATURE_HEADER));

    received.push({
      deliveryId: req.get(DELIVERY_ID_HEADER),
      signatureValid,
      rawBody: raw.toString('utf8'),
      body: parseBody(raw.toString('utf8')),
      receivedAt: new Date()
    });

    if (!signatureValid) {
      logger.warn('Callback rejected: bad signature');
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    logger.info('Callback received', { deliveryId: req.get(DELIVERY_ID_HEADER), status });
    res.status(status).json({ received: status >= 200 && status < 300 });
  });

  return {
    app,
    received,
    setStatus(next: number) {
      status = next;
    }
  };
}

if (require.main === module) {
  const secret = process.env.WEBHOOK_SECRET;
  if (!secret) {
    logger.error('WEBHOOK_SECRET is required to verify callbacks');
    process.exit(1);
  }

  const port = Number(process.env.CALLBACK_RECEIVER_PORT || 3002);
  createCallbackReceiverApp(secret).app.listen(port, () => {
    logger.info(`Callback receiver mock running on port ${port}`, { path: '/callback' });
  });
}
