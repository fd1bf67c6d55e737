import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({ _id: false })
export class MorphologyDocument {
  @Prop({ type: String, default: null })
  gender!: string | null;

  @Prop({ type: String, default: null })
  number!: string | null;

  @Prop({ type: String, default: null })
  tense!: string | null;

  @Prop({ type: Number, default: null })
  person!: number | null;
}

export const MorphologySchema = SchemaFactory.createForClass(MorphologyDocument);

@Schema({ _id: false })
export class LexemeDocument {
  @Prop({ required: true })
  surfaceForm!: string;

  @Prop({ required: true })
  lemma!: string;

  @Prop({ required: true })
  partOfSpeech!: string;

  @Prop({ required: true })
  language!: string;

  @Prop({ type: MorphologySchema, required: true })
  morphology!: MorphologyDocument;
}

export const LexemeSchema = SchemaFactory.createForClass(LexemeDocument);

@Schema({ _id: false })
export class EncounterDocument {
  @Prop({ required: true })
  conversationId!: string;

  @Prop({ required: true })
  messageId!: string;

  @Prop({ required: true, enum: ['learner', 'tutor'] })
  origin!: string;

  @Prop({ required: true })
  encounteredAt!: Date;
}

export const EncounterSchema = SchemaFactory.createForClass(EncounterDocument);

@Schema({ _id: false })
export class ReviewDocument {
  @Prop({ required: true, enum: ['correct', 'incorrect', 'skipped'] })
  outcome!: string;

  @Prop({ required: true })
  reviewedAt!: Date;
}

export const ReviewSchema = SchemaFactory.createForClass(ReviewDocument);

/**
 * Mongoose document for the VocabularyItem aggregate.
 * Mastery and due dates are derived from `reviews` and never stored.
 */
@Schema({
  collection: 'vocabulary_items',
  _id: false, // Disable auto ObjectId, we use custom string _id
})
export class VocabularyItemDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  userId!: string;

  // Lexeme.key, the identity of the lexeme within a learner's vocabulary
  @Prop({ required: true })
  lexemeKey!: string;

  @Prop({ type: LexemeSchema, required: true })
  lexeme!: LexemeDocument;

  @Prop({ type: [EncounterSchema], default: [] })
  encounters!: EncounterDocument[];

  @Prop({ type: [ReviewSchema], default: [] })
  reviews!: ReviewDocument[];

  // Optimistic concurrency counter, bumped on every save
  @Prop({ required: true, default: 1 })
  version!: number;
}

export type VocabularyItemDocumentType = HydratedDocument<VocabularyItemDocument>;
export const VocabularyItemSchema = SchemaFactory.createForClass(VocabularyItemDocument);

// One item per lexeme and learner
VocabularyItemSchema.index({ userId: 1, lexemeKey: 1 }, { unique: true });
