import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose subdocument for individual messages in a conversation.
 */
@Schema({ _id: false })
export class MessageDocument {
  @Prop({ required: true })
  messageId!: string;

  @Prop({ required: true, enum: ['system', 'user', 'assistant'] })
  role!: string;

  @Prop({ required: true })
  content!: string;

  @Prop({ required: true })
  timestamp!: Date;

  @Prop({ type: [String], default: [] })
  vocabularyItemIds!: string[];
}

export const MessageSchema = SchemaFactory.createForClass(MessageDocument);

@Schema({ _id: false })
export class TutorProfileDocument {
  @Prop({ required: true, min: 0, max: 1 })
  creativity!: number;

  @Prop({ required: true, enum: ['practice', 'explanatory', 'corrective', 'conversational'] })
  style!: string;
}

export const TutorProfileSchema = SchemaFactory.createForClass(TutorProfileDocument);

/**
 * Mongoose document for the Conversation aggregate.
 * Messages are embedded: they are only ever read and written with their conversation.
 */
@Schema({
  collection: 'conversations',
  _id: false, // Disable auto ObjectId, we use custom string _id
})
export class ConversationDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true, index: true })
  userId!: string;

  @Prop({ required: true })
  nativeLanguage!: string;

  @Prop({ required: true })
  targetLanguage!: string;

  @Prop({ required: true })
  title!: string;

  @Prop({ type: TutorProfileSchema, required: true })
  tutorProfile!: TutorProfileDocument;

  @Prop({ required: true, enum: ['active', 'archived', 'deleted'] })
  status!: string;

  @Prop({ type: [MessageSchema], default: [] })
  messages!: MessageDocument[];

  // Optimistic concurrency counter, bumped on every save
  @Prop({ required: true, default: 1 })
  version!: number;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  lastActivityAt!: Date;
}

export type ConversationDocumentType = HydratedDocument<ConversationDocument>;
export const ConversationSchema = SchemaFactory.createForClass(ConversationDocument);

// Listing a learner's conversations, newest activity first
ConversationSchema.index({ userId: 1, lastActivityAt: -1 });
