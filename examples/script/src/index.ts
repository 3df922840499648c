#!/usr/bin/env tsx

import chalk from "chalk";
import { Wallet } from "ethers";
import { ElectionHost, isBallotEngineError } from "../../../src";
import {
    CANDIDATES,
    ELECTION_NAME,
    NUM_VOTERS,
    PRIVATE_KEY,
    VERBOSE,
    failure,
    generateTestVoters,
    info,
    step,
    success,
    type TestVoter,
} from "./utils";

// ────────────────────────────────────────────────────────────
//   MAIN SCRIPT STEPS
// ────────────────────────────────────────────────────────────

/**
 * Step 1: Deploy the election owned by PRIVATE_KEY
 */
async function step1_deploy(): Promise<ElectionHost> {
    step(1, "Deploy election");

    const host = new ElectionHost({
        signer: new Wallet(PRIVATE_KEY),
        name: ELECTION_NAME,
        candidates: CANDIDATES,
        verbose: VERBOSE,
    });
    await host.deploy();
    success(`Election "${host.getElectionName()}" deployed, owner ${host.getOwner()}`);

    return host;
}

/**
 * Step 2: Authorize the voters
 */
async function step2_authorize(host: ElectionHost, voters: TestVoter[]): Promise<void> {
    step(2, `Authorize ${voters.length} voters`);

    for (const voter of voters) {
        await host.authorize(voter.wallet.address);
        info(`Authorized ${voter.wallet.address}`);
    }
}

/**
 * Step 3: Every voter casts a vote, then the first one tries again
 */
async function step3_vote(host: ElectionHost, voters: TestVoter[]): Promise<void> {
    step(3, "Cast votes");

    for (const voter of voters) {
        await host.vote(voter.wallet, voter.choice);
        info(`${voter.wallet.address} voted for ${CANDIDATES[voter.choice]}`);
    }

    try {
        await host.vote(voters[0].wallet, voters[0].choice);
        failure("Second vote was accepted");
    } catch (error) {
        if (!isBallotEngineError(error)) throw error;
        success(`Second vote rejected with ${error.code}`);
    }
}

/**
 * Step 4: Tally
 */
async function step4_tally(host: ElectionHost): Promise<void> {
    step(4, "Tally results");

    const results = await host.tally();
    for (const result of results) {
        console.log(`  ${chalk.bold(result.name)}: ${result.voteCount}`);
    }
    success(`Total votes: ${host.getTotalVotes()}`);
}

async function run() {
    console.log(chalk.bold.cyan("\n🗳  Ballot engine walkthrough\n"));

    const host = await step1_deploy();
    const voters = generateTestVoters(NUM_VOTERS, CANDIDATES.length);
    await step2_authorize(host, voters);
    await step3_vote(host, voters);
    await step4_tally(host);
}

run().catch((error) => {
    console.error(chalk.red("❌ Script failed:"), error);
    process.exit(1);
});
