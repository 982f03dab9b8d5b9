import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import request from 'supertest';
import { AdmissionService } from './../src/admission/admission.service';
import { IdempotencyService } from './../src/admission/idempotency.service';
import { CATALOG_STORE } from './../src/catalog/interfaces/catalog-store.interface';
import { ClassificationService } from './../src/classification/classification.service';
import { PipelineExceptionFilter } from './../src/common/pipeline-exception.filter';
import { DeliveryQueueService } from './../src/delivery/delivery-queue.service';
import { DuplicateDetectorService } from './../src/duplicates/duplicate-detector.service';
import { IntakeController } from './../src/intake/intake.controller';
import { IntakeService } from './../src/intake/intake.service';
import { LEAD_STORE } from './../src/leads/interfaces/lead-store.interface';
import { RoutingService } from './../src/routing/routing.service';
import { ValidationService } from './../src/validation/validation.service';
import {
    buildBuyer,
    buildEnrollment,
    buildOffer,
    buildRoutingPolicy,
    buildServiceArea,
    buildSource,
    buildValidationPolicy,
} from './support/fixtures';
import { InMemoryLeadExchange } from './support/in-memory-store';

describe('IntakeController (e2e)', () => {
    let app: INestApplication;
    let store: InMemoryLeadExchange;

    const mockDeliveryQueue = {
        enqueue: jest.fn(),
    };

    const payload = {
        source_key: 'lp.austin.plumbing',
        idempotency_key: 'client-key-0000000001',
        name: 'Pat Example',
        email: 'pat@example.com',
        phone: '5125550123',
        postal_code: '78701',
        city: 'Austin',
    };

    beforeEach(async () => {
        mockDeliveryQueue.enqueue.mockReset().mockResolvedValue('lead-1');

        store = new InMemoryLeadExchange();
        store.offers = [buildOffer()];
        store.sources = [
            buildSource(),
            buildSource({
                id: 2,
                sourceKey: 'partner.austin.api',
                kind: 'partner_api',
                hostname: 'leads.partner.test',
                pathPrefix: null,
            }),
        ];
        store.buyers = [buildBuyer()];
        store.enrollments = [buildEnrollment()];
        store.serviceAreas = [buildServiceArea()];
        store.validationPolicies = [
            buildValidationPolicy({
                rules: [{ type: 'required_fields', fields: ['name', 'phone'] }],
                duplicate_detection: { enabled: true, window_hours: 24 },
            }),
        ];
        store.routingPolicies = [buildRoutingPolicy({ strategy: 'priority' })];

        const moduleFixture: TestingModule = await Test.createTestingModule({
            controllers: [IntakeController],
            providers: [
                IntakeService,
                ClassificationService,
                IdempotencyService,
                AdmissionService,
                DuplicateDetectorService,
                ValidationService,
                RoutingService,
                { provide: DeliveryQueueService, useValue: mockDeliveryQueue },
                { provide: LEAD_STORE, useValue: store },
                { provide: CATALOG_STORE, useValue: store },
            ],
        }).compile();

        app = moduleFixture.createNestApplication();
        app.useGlobalPipes(new ValidationPipe());
        app.useGlobalFilters(new PipelineExceptionFilter());
        await app.init();
    });

    afterEach(async () => {
        if (app) {
            await app.close();
        }
    });

    it('/leads (POST) - routes a valid lead and queues it for delivery', async () => {
        const response = await request(app.getHttpServer())
            .post('/leads')
            .send(payload)
            .expect(202);

        expect(response.body).toEqual({
            lead_id: 1,
            status: 'validated',
            source_id: 1,
            offer_id: 10,
            market_id: 100,
            vertical_id: 200,
            idempotency_key: 'client-key-0000000001',
            buyer_id: 1,
            price: null,
        });
        expect(mockDeliveryQueue.enqueue).toHaveBeenCalledWith(1);
    });

    it('/leads (POST) - Idempotency', async () => {
        const res1 = await request(app.getHttpServer())
            .post('/leads')
            .send(payload)
            .expect(202);

        const res2 = await request(app.getHttpServer())
            .post('/leads')
            .send(payload)
            .expect(202);

        expect(res1.body.lead_id).toBe(res2.body.lead_id);
        expect(res2.body.status).toBe('validated');
        expect(res2.body.buyer_id).toBe(1);
        expect(store.leads.size).toBe(1);
        expect(store.lead(1).isDuplicate).toBe(false);
    });

    it('/leads (POST) - Idempotency with a derived key', async () => {
        const { idempotency_key: _idem, ...retried } = payload;

        const res1 = await request(app.getHttpServer())
            .post('/leads')
            .send(retried)
            .expect(202);

        const res2 = await request(app.getHttpServer())
            .post('/leads')
            .send({ ...retried, email: 'PAT@example.com' })
            .expect(202);

        expect(res2.body.lead_id).toBe(res1.body.lead_id);
        expect(res2.body.idempotency_key).toBe(res1.body.idempotency_key);
        expect(store.leads.size).toBe(1);
    });

    it('/leads (POST) - rejects a lead missing a required field', async () => {
        const { name: _omitted, ...withoutName } = payload;

        const response = await request(app.getHttpServer())
            .post('/leads')
            .send(withoutName)
            .expect(202);

        expect(response.body.status).toBe('rejected');
        expect(response.body.buyer_id).toBeNull();
        expect(store.lead(1).validationReason).toBe('required_field_missing_name');
        expect(mockDeliveryQueue.enqueue).not.toHaveBeenCalled();
    });

    it('/leads (POST) - rejects a second submission with the same phone as a duplicate', async () => {
        await request(app.getHttpServer()).post('/leads').send(payload).expect(202);

        const response = await request(app.getHttpServer())
            .post('/leads')
            .send({ ...payload, idempotency_key: 'client-key-0000000002' })
            .expect(202);

        expect(response.body.lead_id).toBe(2);
        expect(response.body.status).toBe('rejected');
        expect(store.lead(2).duplicateOfLeadId).toBe(1);
        expect(store.lead(2).validationReason).toBe('duplicate_lead');
        expect(mockDeliveryQueue.enqueue).toHaveBeenCalledTimes(1);
    });

    it('/leads (POST) - leaves a lead outside every service area unrouted', async () => {
        const response = await request(app.getHttpServer())
            .post('/leads')
            .send({ ...payload, postal_code: '73301', city: 'Round Rock' })
            .expect(202);

        expect(response.body.status).toBe('validated');
        expect(response.body.buyer_id).toBeNull();
        expect(mockDeliveryQueue.enqueue).not.toHaveBeenCalled();
    });

    it('/leads (POST) - attributes by Host header and derives a key', async () => {
        const { source_key: _key, idempotency_key: _idem, ...body } = payload;

        const response = await request(app.getHttpServer())
            .post('/leads')
            .set('Host', 'LEADS.partner.test:8443')
            .send(body)
            .expect(202);

        expect(response.body.source_id).toBe(2);
        expect(response.body.idempotency_key).toMatch(/^[0-9a-f]{64}$/);
    });

    it('/leads (POST) - unknown source key', async () => {
        const response = await request(app.getHttpServer())
            .post('/leads')
            .send({ ...payload, source_key: 'lp.unknown' })
            .expect(400);

        expect(response.body).toEqual({
            code: 'invalid_source_key',
            message: 'No active source for key lp.unknown',
            reason: 'not_found',
            source_key: 'lp.unknown',
        });
        expect(store.leads.size).toBe(0);
    });

    it('/leads (POST) - malformed idempotency key', async () => {
        const response = await request(app.getHttpServer())
            .post('/leads')
            .send({ ...payload, idempotency_key: 'short' })
            .expect(400);

        expect(response.body.code).toBe('invalid_idempotency_key_format');
    });

    it('/leads (POST) - Validation Error', async () => {
        await request(app.getHttpServer())
            .post('/leads')
            .send({ ...payload, email: 'invalid-email' })
            .expect(400);

        expect(store.leads.size).toBe(0);
    });
});
