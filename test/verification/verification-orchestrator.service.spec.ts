import {
  ModelUnavailableError,
  PipelineError,
} from "../../src/common/errors/verification.errors";
import { resetEnvironmentCacheForTests } from "../../src/config/environment";
import { FieldMatcherService } from "../../src/verification/field-matcher.service";
import { UNREADABLE_IMAGE_MESSAGE } from "../../src/verification/verification-orchestrator.service";
import {
  DocumentKind,
  VerificationDecision,
  createVerificationRequest,
  type ClaimedFields,
  type FieldMatchResult,
} from "../../src/verification/verification.types";
import {
  FakeCaptioningCapability,
  FakeTextExtractionCapability,
  deferred,
  linesToRegions,
  waitFor,
} from "../helpers/fake-capabilities";
import { solidPng } from "../helpers/images";
import { createPipeline } from "../helpers/pipeline";

const CERTIFICATE_LINES = [
  "Certificate of Achievement",
  "This is awarded to Jane Roe",
  "Acme University",
  "for Data Science",
];

const CERTIFICATE_CLAIM: ClaimedFields = {
  fullName: "Jane Roe",
  description: "Acme University - Data Science",
};

describe("VerificationOrchestrator", () => {
  let image: Buffer;

  beforeAll(async () => {
    image = await solidPng(64, 48);
  });

  it("approves a certificate whose text corroborates every claim", async () => {
    const { orchestrator } = createPipeline({
      captioning: FakeCaptioningCapability.answering(
        "yes, it is a certificate and award",
      ),
      ocr: FakeTextExtractionCapability.returning(
        linesToRegions(CERTIFICATE_LINES, 0.95),
      ),
    });

    const outcome = await orchestrator.verify(
      createVerificationRequest(image, DocumentKind.CERTIFICATE, CERTIFICATE_CLAIM),
    );

    expect(outcome.decision).toBe(VerificationDecision.AUTO_APPROVE);
    expect(outcome.isValid).toBe(true);
    expect(outcome.message).toBe("Certificate verified successfully");
    expect(outcome.confidenceScores).toEqual({
      overall: expect.closeTo(0.99, 10),
      imageTypeMatch: 1,
      studentNameMatch: 1,
      institutionMatch: 1,
      skillMatch: 1,
      ocrConfidence: 0.95,
    });
    expect(outcome.evidence?.extractedText).toBe(CERTIFICATE_LINES.join(" "));
    expect(outcome.evidence?.caption).toBe("yes, it is a certificate and award");
    expect(Object.isFrozen(outcome)).toBe(true);
    expect(Object.isFrozen(outcome.confidenceScores)).toBe(true);
  });

  it("rejects an undecodable upload without calling any model", async () => {
    const captioning = FakeCaptioningCapability.answering("yes");
    const ocr = FakeTextExtractionCapability.returning([]);
    const { orchestrator } = createPipeline({ captioning, ocr });

    const outcome = await orchestrator.verify(
      createVerificationRequest(
        Buffer.from("corrupted bytes"),
        DocumentKind.CERTIFICATE,
        CERTIFICATE_CLAIM,
      ),
    );

    expect(outcome).toEqual({
      isValid: false,
      decision: VerificationDecision.AUTO_REJECT,
      confidenceScores: { overall: 0 },
      message: UNREADABLE_IMAGE_MESSAGE,
      evidence: undefined,
    });
    expect(captioning.calls).toBe(0);
    expect(ocr.calls).toBe(0);
  });

  it("rejects a blank image with no readable text", async () => {
    const { orchestrator } = createPipeline({
      captioning: FakeCaptioningCapability.answering("a plain grey square"),
      ocr: FakeTextExtractionCapability.returning([]),
    });

    const outcome = await orchestrator.verify(
      createVerificationRequest(image, DocumentKind.COLLEGE_ID, {
        fullName: "Jane Roe",
        rollNumber: "CS-101",
      }),
    );

    expect(outcome.decision).toBe(VerificationDecision.AUTO_REJECT);
    expect(outcome.isValid).toBe(false);
    expect(outcome.confidenceScores).toEqual({
      overall: 0,
      imageTypeMatch: 0,
      studentNameMatch: 0,
      rollNumberMatch: 0,
      ocrConfidence: 0,
    });
  });

  it("fails the request when the captioning model is unavailable", async () => {
    const ocr = FakeTextExtractionCapability.returning(
      linesToRegions(CERTIFICATE_LINES),
    );
    const { orchestrator } = createPipeline({
      captioning: new FakeCaptioningCapability(async () => {
        throw new Error("connection refused");
      }),
      ocr,
    });

    const verification = orchestrator.verify(
      createVerificationRequest(image, DocumentKind.CERTIFICATE, CERTIFICATE_CLAIM),
    );

    await expect(verification).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(verification).rejects.toMatchObject({ stage: "classify" });
    expect(ocr.calls).toBe(1);
  });

  it("reports the model failure even when the environment cannot be loaded", async () => {
    const previousPort = process.env.PORT;
    process.env.PORT = "not-a-port";
    resetEnvironmentCacheForTests();
    const { orchestrator } = createPipeline({
      captioning: new FakeCaptioningCapability(async () => {
        throw new Error("connection refused");
      }),
      ocr: FakeTextExtractionCapability.returning([]),
    });

    try {
      await expect(
        orchestrator.verify(
          createVerificationRequest(image, DocumentKind.COLLEGE_ID, {
            fullName: "Jane Roe",
          }),
        ),
      ).rejects.toBeInstanceOf(ModelUnavailableError);
    } finally {
      if (previousPort === undefined) {
        delete process.env.PORT;
      } else {
        process.env.PORT = previousPort;
      }
      resetEnvironmentCacheForTests();
    }
  });

  it("treats an OCR call that outlives the request budget as unavailable", async () => {
    const { orchestrator } = createPipeline({
      captioning: FakeCaptioningCapability.answering("yes"),
      ocr: new FakeTextExtractionCapability(() => new Promise(() => undefined)),
    });

    await expect(
      orchestrator.verify(
        createVerificationRequest(image, DocumentKind.COLLEGE_ID, {
          fullName: "Jane Roe",
        }),
        { timeoutMs: 200 },
      ),
    ).rejects.toMatchObject({ stage: "extract", reason: "timeout" });
  });

  it("wraps unexpected stage failures with the failing stage", async () => {
    class BrokenMatcher extends FieldMatcherService {
      override match(): FieldMatchResult[] {
        throw new TypeError("unexpected input");
      }
    }
    const { orchestrator } = createPipeline({
      captioning: FakeCaptioningCapability.answering("yes"),
      ocr: FakeTextExtractionCapability.returning([]),
      matcher: new BrokenMatcher(),
    });

    const verification = orchestrator.verify(
      createVerificationRequest(image, DocumentKind.COLLEGE_ID, {}),
    );

    await expect(verification).rejects.toBeInstanceOf(PipelineError);
    await expect(verification).rejects.toMatchObject({
      stage: "match",
      message: "Verification failed during match: unexpected input",
    });
  });

  it("runs classification and extraction concurrently", async () => {
    const caption = deferred<string>();
    const captioning = new FakeCaptioningCapability(() => caption.promise);
    const ocr = FakeTextExtractionCapability.returning(
      linesToRegions(CERTIFICATE_LINES),
    );
    const { orchestrator } = createPipeline({ captioning, ocr });

    const verification = orchestrator.verify(
      createVerificationRequest(image, DocumentKind.CERTIFICATE, CERTIFICATE_CLAIM),
    );

    await waitFor(() => ocr.calls === 1);
    expect(captioning.calls).toBe(1);

    caption.resolve("yes, a certificate");
    await expect(verification).resolves.toMatchObject({
      decision: expect.any(String),
    });
  });

  it("excludes an unclaimed roll number from the overall score", async () => {
    const lines = ["Student Identity Card", "Jane Roe", "Roll No CS 101"];
    const { orchestrator } = createPipeline({
      captioning: FakeCaptioningCapability.answering("yes, a student id card"),
      ocr: FakeTextExtractionCapability.returning(linesToRegions(lines, 0.7)),
    });

    const withRoll = await orchestrator.verify(
      createVerificationRequest(image, DocumentKind.COLLEGE_ID, {
        fullName: "Jane Roe",
        rollNumber: "CS-101",
      }),
    );
    const withoutRoll = await orchestrator.verify(
      createVerificationRequest(image, DocumentKind.COLLEGE_ID, {
        fullName: "Jane Roe",
      }),
    );

    expect(withRoll.confidenceScores.rollNumberMatch).toBe(1);
    expect(withRoll.confidenceScores.overall).toBeCloseTo(3.7 / 4, 10);
    expect(withoutRoll.confidenceScores).not.toHaveProperty("rollNumberMatch");
    expect(withoutRoll.confidenceScores.overall).toBeCloseTo(2.7 / 3, 10);
    expect(withRoll.decision).toBe(VerificationDecision.AUTO_APPROVE);
    expect(withoutRoll.decision).toBe(VerificationDecision.AUTO_APPROVE);
  });

  it("returns identical scores for identical input", async () => {
    const { orchestrator } = createPipeline({
      captioning: FakeCaptioningCapability.answering("yes, a certificate"),
      ocr: FakeTextExtractionCapability.returning(
        linesToRegions(CERTIFICATE_LINES, 0.8),
      ),
    });
    const request = createVerificationRequest(
      image,
      DocumentKind.CERTIFICATE,
      CERTIFICATE_CLAIM,
    );

    const first = await orchestrator.verify(request);
    const second = await orchestrator.verify(request);

    expect(second.confidenceScores).toEqual(first.confidenceScores);
    expect(second.decision).toBe(first.decision);
  });
});
