/**
 * training-panel.tsx — Guided wake-word and command recording.
 *
 * Samples are kept in this page only; the summary says so.
 */

import { Button } from "@/components/ui/button.tsx";
import { Card, CardHeader, CardTitle, CardContent } from "@/components/ui/card.tsx";
import { ArrowLeft, ArrowRight, Circle, Loader2, RotateCcw, SkipForward } from "lucide-react";
import {
  TRAINING_COMMANDS,
  WAKE_SAMPLE_COUNT,
  type TrainingSnapshot,
  type VoiceTrainer,
} from "@/lib/voice-training.ts";

interface TrainingPanelProps {
  training: TrainingSnapshot;
  trainer: VoiceTrainer;
  wakeWord: string;
}

export function TrainingPanel({ training, trainer, wakeWord }: TrainingPanelProps) {
  const phrase = trainer.currentPhrase(wakeWord);
  const { recording, step } = training;

  const recordButton = (onClick: () => void) => (
    <Button size="sm" disabled={recording} onClick={onClick}>
      {recording ? <Loader2 className="h-3.5 w-3.5 animate-spin" /> : <Circle className="h-3.5 w-3.5 fill-current" />}
      {recording ? "Recording..." : "Record"}
    </Button>
  );

  return (
    <Card>
      <CardHeader>
        <CardTitle>Voice Training</CardTitle>
      </CardHeader>
      <CardContent className="space-y-3 text-sm">
        {step === "wake-word" && (
          <>
            <p>
              Say <strong>"{phrase}"</strong> when recording starts.{" "}
              <span className="text-muted-foreground">
                {training.wakeSamples.length}/{WAKE_SAMPLE_COUNT} samples
              </span>
            </p>
            <div className="flex gap-2">
              {recordButton(() => {
                void trainer.recordWakeSample(wakeWord);
              })}
              <Button
                size="sm"
                variant="outline"
                disabled={recording || training.wakeSamples.length < WAKE_SAMPLE_COUNT}
                onClick={() => trainer.next()}
              >
                Next <ArrowRight className="h-3.5 w-3.5" />
              </Button>
            </div>
          </>
        )}

        {step === "commands" && (
          <>
            <p>
              Say <strong>"{phrase}"</strong> when recording starts.{" "}
              <span className="text-muted-foreground">
                Command {training.commandIndex + 1} of {TRAINING_COMMANDS.length}
              </span>
            </p>
            <div className="flex flex-wrap gap-2">
              <Button size="sm" variant="outline" disabled={recording} onClick={() => trainer.back()}>
                <ArrowLeft className="h-3.5 w-3.5" /> Back
              </Button>
              {recordButton(() => {
                void trainer.recordCommandSample();
              })}
              <Button size="sm" variant="ghost" disabled={recording} onClick={() => trainer.skipCommand()}>
                <SkipForward className="h-3.5 w-3.5" /> Skip
              </Button>
            </div>
          </>
        )}

        {step === "summary" && <TrainingSummary trainer={trainer} finished={training.finished} />}

        {(training.wakeSamples.length > 0 || training.commandSamples.length > 0) && (
          <ul className="space-y-1 text-xs">
            {[...training.wakeSamples, ...training.commandSamples].map((s) => (
              <li key={s.id} className="flex items-center gap-2">
                <span className="min-w-0 flex-1 truncate">{s.phrase}</span>
                <audio controls src={s.audioRef} className="h-6" />
              </li>
            ))}
          </ul>
        )}
      </CardContent>
    </Card>
  );
}

function TrainingSummary({ trainer, finished }: { trainer: VoiceTrainer; finished: boolean }) {
  const summary = trainer.summary();
  return (
    <div className="space-y-2">
      <div className="grid grid-cols-3 gap-2 text-center text-xs">
        <div className="rounded bg-muted/50 p-2">
          <div className="text-lg font-semibold">{summary.wakeSamples}</div>
          wake samples
        </div>
        <div className="rounded bg-muted/50 p-2">
          <div className="text-lg font-semibold">{summary.commandSamples}</div>
          command samples
        </div>
        <div className="rounded bg-muted/50 p-2">
          <div className="text-lg font-semibold">{summary.confidence}</div>
          confidence
        </div>
      </div>
      {finished ? (
        <p className="text-xs text-muted-foreground">
          Samples stay in this page only. They are not uploaded and do not change recognition.
        </p>
      ) : (
        <Button size="sm" onClick={() => trainer.finish()}>Finish</Button>
      )}
      <Button size="sm" variant="outline" onClick={() => trainer.reset()}>
        <RotateCcw className="h-3.5 w-3.5" /> Start Over
      </Button>
    </div>
  );
}
