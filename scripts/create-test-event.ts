import dotenv from "dotenv";
dotenv.config({ path: ".env.local" });
import fs from "fs";
import path from "path";
import { buildClient, CommitmentPolicy, KmsKeyringNode } from "@aws-crypto/client-node";
import { loadConfig } from "../src/config";
import { CUSTOM_SMS_SENDER_REQUEST_TYPE, CustomSmsSenderEvent } from "../src/sms/sms.types";

// Usage: ts-node scripts/create-test-event.ts <phone> [code] [triggerSource]
const phoneNumber = process.argv[2];
const code = process.argv[3] || "123456";
const triggerSource = process.argv[4] || "CustomSMSSender_SignUp";

const createTestEvent = async () => {
  if (!phoneNumber) {
    throw new Error("Recipient phone number (E.164) is required as first argument");
  }

  const config = loadConfig();
  const { encrypt } = buildClient(CommitmentPolicy.REQUIRE_ENCRYPT_ALLOW_DECRYPT);
  const keyring = new KmsKeyringNode({
    generatorKeyId: config.kms.keyId,
    keyIds: [config.kms.keyArn],
  });

  const { result } = await encrypt(keyring, code);

  const event: CustomSmsSenderEvent = {
    triggerSource,
    userPoolId: "local-test-pool",
    userName: "local-test-user",
    request: {
      type: CUSTOM_SMS_SENDER_REQUEST_TYPE,
      code: result.toString("base64"),
      userAttributes: {
        phone_number: phoneNumber,
      },
    },
  };

  const outputPath = path.resolve(__dirname, "..", "events", "test-event.json");
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(event, null, 2));
  console.log(`Test event written to ${outputPath}`);
};

createTestEvent().catch((error) => {
  console.error("Failed to create test event:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
